import path from "node:path";
import chalk from "chalk";
import { AnalysisBar, type Outcome } from "../bar";
import type { CompositionConfig } from "../config";
import { type Feedback, feedbackFor } from "../composition/feedback";
import { CompositionManager } from "../composition/manager";
import { type CompositionResultJSON, toJSON } from "../composition/serialize";
import type {
	BoundingBox,
	CompositionType,
	SubjectKind,
	SubjectObservation,
} from "../composition/types";
import { SubjectDetector } from "../detect/detector";
import { createFaceApiDetector } from "../detect/faceapi";
import { loadFrameFromFile } from "../detect/frame";

export type AnalyzeOptions = {
	rule: CompositionType;
	/** also score every rule and report the best one */
	recommend: boolean;
	/** skip detection and use this box for every photo */
	subject?: BoundingBox;
	subjectKind?: Exclude<SubjectKind, "none">;
	config: CompositionConfig;
};

export type PhotoAnalysis = {
	path: string;
	subject: SubjectKind;
	result: CompositionResultJSON | null;
	feedback: Feedback | null;
	best: { type: CompositionType; score: number } | null;
	error?: string;
};

/** Parse "x,y,width,height" (normalized) into a box */
export function parseSubjectBox(text: string): BoundingBox {
	const parts = text.split(",").map((s) => Number(s.trim()));
	const [x, y, width, height] = parts;
	if (
		parts.length !== 4 ||
		x === undefined ||
		y === undefined ||
		width === undefined ||
		height === undefined ||
		parts.some((n) => !Number.isFinite(n) || n < 0 || n > 1)
	) {
		throw new Error(
			`Invalid --subject "${text}": expected four numbers in 0..1 as x,y,width,height`,
		);
	}
	if (width === 0 || height === 0 || x + width > 1 || y + height > 1) {
		throw new Error(`Invalid --subject "${text}": box must fit inside the frame`);
	}
	return { x, y, width, height };
}

export function createDetector(cfg: CompositionConfig): SubjectDetector {
	if (cfg.skipFacialRecognition) {
		console.log(
			"⚠️ --skip-facial-recognition set, photos without --subject will have no subject",
		);
		return new SubjectDetector({});
	}
	return new SubjectDetector({
		face: createFaceApiDetector({
			modelsDir: cfg.modelsDir,
			minConfidence: cfg.faceMinConfidence,
		}),
	});
}

export async function analyzePhoto(
	filePath: string,
	detector: SubjectDetector,
	manager: CompositionManager,
	opts: AnalyzeOptions,
): Promise<PhotoAnalysis> {
	const frame = await loadFrameFromFile(filePath, opts.config.analysisMaxDim);

	const observation: SubjectObservation = opts.subject
		? { boundingBox: opts.subject, kind: opts.subjectKind ?? "human", confidence: 1 }
		: await detector.detect(frame);

	const result = await manager.evaluate(observation, frame, frame.pixels);
	const best = opts.recommend
		? await manager.getBestCompositionSuggestion(observation, frame, frame.pixels)
		: null;

	return {
		path: path.resolve(filePath),
		subject: observation.kind,
		result: result ? toJSON(result) : null,
		feedback: result && observation.kind !== "none" ? feedbackFor(result) : null,
		best: best ? { type: best.type, score: best.score } : null,
	};
}

export function outcomeOf(entry: PhotoAnalysis): Outcome {
	if (entry.error) return "failed";
	if (!entry.result || entry.subject === "none") return "no-subject";
	return entry.result.status;
}

/** Evaluate every photo with one manager; unreadable photos are reported and skipped. */
export async function analyzeImages(
	files: string[],
	opts: AnalyzeOptions,
): Promise<PhotoAnalysis[]> {
	const detector = createDetector(opts.config);
	const manager = new CompositionManager(opts.config, { compositionType: opts.rule });

	const out: PhotoAnalysis[] = [];
	const progress = new AnalysisBar(files.length);
	for (const file of files) {
		progress.begin(path.basename(file));
		let entry: PhotoAnalysis;
		try {
			entry = await analyzePhoto(file, detector, manager, opts);
		} catch (err) {
			const message = err instanceof Error ? err.message : String(err);
			console.error(chalk.red(`\n❌ Failed to analyze ${file}:`), message);
			entry = {
				path: path.resolve(file),
				subject: "none",
				result: null,
				feedback: null,
				best: null,
				error: message,
			};
		}
		out.push(entry);
		progress.record(outcomeOf(entry));
	}
	progress.finish();
	return out;
}
