import { round2 } from "../utils";
import type { CompositionResult, CompositionStatus, SubjectSize } from "./types";

export type CompositionResultJSON = {
	composition: CompositionResult["compositionType"];
	score: number;
	status: CompositionStatus;
	suggestion: string;
	context: {
		subjectSize: SubjectSize;
		subjectOffsetX: number;
		subjectOffsetY: number;
		multipleSubjects: boolean;
	};
};

/** JSON-compatible view for logging, two decimals on every number */
export function toJSON(result: CompositionResult): CompositionResultJSON {
	return {
		composition: result.compositionType,
		score: round2(result.score),
		status: result.status,
		suggestion: result.suggestion,
		context: {
			subjectSize: result.context.subjectSize,
			subjectOffsetX: round2(result.context.offsetX),
			subjectOffsetY: round2(result.context.offsetY),
			multipleSubjects: result.context.multipleSubjects,
		},
	};
}

export function toJSONString(result: CompositionResult): string {
	return JSON.stringify(toJSON(result), null, 2);
}
