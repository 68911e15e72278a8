import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import type {
	BoundingBox,
	CompositionContext,
	Edge,
	Size,
	SubjectObservation,
	SubjectSize,
} from "./types";

export function boxCenter(box: Readonly<BoundingBox>): { x: number; y: number } {
	return { x: box.x + box.width / 2, y: box.y + box.height / 2 };
}

export function classifySize(
	box: Readonly<BoundingBox>,
	cfg: Pick<CompositionConfig, "smallSubjectArea" | "largeSubjectArea"> = DEFAULT_CONFIG,
): SubjectSize {
	// boxes are normalized, so the area is already a fraction of the frame
	const area = box.width * box.height;
	if (area < cfg.smallSubjectArea) return "small";
	if (area <= cfg.largeSubjectArea) return "medium";
	return "large";
}

/**
 * Rule-agnostic signals for one subject in one frame. Offsets are measured from
 * the geometric center; rule services re-measure against their own targets.
 */
export function analyzeContext(
	observation: SubjectObservation,
	frameSize: Size,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): CompositionContext {
	const box = observation.boundingBox;
	const center = boxCenter(box);

	const margins: Record<Edge, number> = {
		top: box.y,
		bottom: 1 - (box.y + box.height),
		left: box.x,
		right: 1 - (box.x + box.width),
	};
	const order: Edge[] = ["top", "bottom", "left", "right"];
	const dangerousEdges = order.filter((e) => margins[e] < cfg.edgeMargin);
	const marginFraction = Math.min(...order.map((e) => margins[e]));

	const ratio = margins.top;
	const cutoff = margins.bottom < cfg.cutoffMargin;

	return {
		subjectSize: classifySize(box, cfg),
		offsetX: center.x - 0.5,
		offsetY: center.y - 0.5,
		edgeProximity: {
			tooClose: dangerousEdges.length > 0,
			dangerousEdges,
			marginFraction,
		},
		headroom: {
			ratio,
			excessive: ratio > cfg.headroomExcessive,
			cutoff,
			optimalForPortrait:
				ratio >= cfg.portraitHeadroomMin && ratio <= cfg.portraitHeadroomMax,
		},
		multipleSubjects: (observation.candidateCount ?? 0) > 1,
	};
}

/** Suggestion shared by every rule when the subject crowds the frame edge */
export function edgeSuggestion(context: CompositionContext): string | null {
	const { tooClose, dangerousEdges } = context.edgeProximity;
	if (!tooClose) return null;
	return `Step back: subject is too close to the ${dangerousEdges.join(" and ")} edge`;
}

/**
 * A subject clipped at the bottom. With a lot of room above as well, the subject
 * is framed low and far, so the advice is to get closer instead.
 */
export function cutoffSuggestion(context: CompositionContext): string | null {
	const { cutoff, excessive } = context.headroom;
	if (!cutoff) return null;
	return excessive ? "Get closer" : "Subject cut off";
}
