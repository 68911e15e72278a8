import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import { clamp01 } from "../utils";
import { analyzeContext, boxCenter, cutoffSuggestion, edgeSuggestion } from "./context";
import type {
	CompositionResult,
	CompositionStatus,
	PixelData,
	Quadrant,
	Size,
	SubjectObservation,
	SubjectSize,
	ThirdsDetails,
} from "./types";

const ONE = 1 / 3;
const TWO = 2 / 3;

const INTERSECTIONS: ReadonlyArray<{ x: number; y: number; quadrant: Quadrant }> = [
	{ x: ONE, y: ONE, quadrant: "top-left" },
	{ x: ONE, y: TWO, quadrant: "bottom-left" },
	{ x: TWO, y: ONE, quadrant: "top-right" },
	{ x: TWO, y: TWO, quadrant: "bottom-right" },
];

const LINES = [ONE, TWO];

export function thirdsTolerance(
	size: SubjectSize,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): number {
	return cfg.thirds.tolerance[size];
}

function nearestIntersection(x: number, y: number) {
	let best = { distance: Number.POSITIVE_INFINITY, point: INTERSECTIONS[0] };
	for (const point of INTERSECTIONS) {
		const distance = Math.hypot(x - point.x, y - point.y);
		// strict: ties keep the earlier intersection
		if (distance < best.distance) best = { distance, point };
	}
	return best;
}

function nearestLineDistance(x: number, y: number): number {
	return Math.min(
		...LINES.map((l) => Math.abs(x - l)),
		...LINES.map((l) => Math.abs(y - l)),
	);
}

function falloff(distance: number, tolerance: number): number {
	return clamp01(1 - distance / tolerance);
}

export function thirdsStatus(
	score: number,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): CompositionStatus {
	if (score > cfg.thirds.perfect) return "Perfect";
	if (score > cfg.thirds.good) return "Good";
	return "NeedsAdjustment";
}

function nudge(dx: number, dy: number): string {
	if (Math.abs(dx) >= Math.abs(dy)) return dx > 0 ? "right" : "left";
	return dy > 0 ? "down" : "up";
}

/**
 * Scores the subject center against the four thirds intersections and the four
 * grid lines. Tolerance widens with subject size.
 */
export async function evaluateRuleOfThirds(
	subject: SubjectObservation,
	frameSize: Size,
	_pixels: PixelData | undefined,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): Promise<CompositionResult> {
	const context = analyzeContext(subject, frameSize, cfg);
	const { x, y } = boxCenter(subject.boundingBox);
	const tolerance = thirdsTolerance(context.subjectSize, cfg);

	const nearest = nearestIntersection(x, y);
	const quadrant = nearest.point?.quadrant ?? "top-left";
	const intersectionScore = falloff(nearest.distance, tolerance);
	const lineScore = falloff(nearestLineDistance(x, y), tolerance);

	const score = clamp01(
		Math.max(intersectionScore, lineScore * cfg.thirds.lineWeight),
	);
	const status = thirdsStatus(score, cfg);

	let suggestion: string;
	if (status === "Perfect") {
		suggestion = `Nailed it! Subject sits on the ${quadrant} third.`;
	} else if (status === "Good") {
		const dir = nudge((nearest.point?.x ?? x) - x, (nearest.point?.y ?? y) - y);
		suggestion = `Move subject slightly ${dir} to align with ${quadrant} third.`;
	} else {
		suggestion =
			edgeSuggestion(context) ??
			(context.headroom.excessive ? `Get closer, then move to ${quadrant} third` : null) ??
			cutoffSuggestion(context) ??
			`Move to ${quadrant} third`;
	}

	const details: ThirdsDetails = {
		rule: "rule_of_thirds",
		nearestQuadrant: quadrant,
		intersectionScore,
		lineScore,
		tolerance,
	};

	return {
		compositionType: "rule_of_thirds",
		score,
		status,
		suggestion,
		context,
		details,
	};
}
