import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import { clamp01 } from "../utils";
import { analyzeContext, boxCenter, cutoffSuggestion, edgeSuggestion } from "./context";
import { mirrorSimilarity, sampleLuma } from "./luminance";
import type {
	CenterDetails,
	CompositionResult,
	CompositionStatus,
	PixelData,
	Size,
	SubjectObservation,
} from "./types";

// farthest a subject center can be from the frame center
const MAX_DISTANCE = Math.SQRT1_2;

/**
 * Distance-only centering score. Inside the tolerance the score stays at or above
 * 0.7; outside it decays linearly from just under 0.7 to 0 at a corner.
 */
export function centeringScore(
	distance: number,
	tolerance: number,
): number {
	if (distance <= tolerance) {
		return 0.7 + 0.3 * clamp01(1 - distance / tolerance);
	}
	return 0.7 * clamp01(1 - (distance - tolerance) / (MAX_DISTANCE - tolerance));
}

/**
 * Camera follows the subject: a subject right of center means "move right".
 */
export function directionHint(
	dx: number,
	dy: number,
	threshold: number,
): string | null {
	const horizontal = Math.abs(dx) > threshold ? (dx > 0 ? "right" : "left") : null;
	const vertical = Math.abs(dy) > threshold ? (dy > 0 ? "down" : "up") : null;
	if (horizontal && vertical) return `Move ${horizontal} and ${vertical}`;
	if (horizontal) return `Move ${horizontal}`;
	if (vertical) return `Move ${vertical}`;
	return null;
}

export async function evaluateCenterFraming(
	subject: SubjectObservation,
	frameSize: Size,
	pixels: PixelData | undefined,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): Promise<CompositionResult> {
	const context = analyzeContext(subject, frameSize, cfg);
	const { x, y } = boxCenter(subject.boundingBox);
	// fixed target: the frame center, whatever the subject size
	const dx = x - 0.5;
	const dy = y - 0.5;
	const distance = Math.hypot(dx, dy);
	const centered = distance <= cfg.center.tolerance;

	const base = centeringScore(distance, cfg.center.tolerance);
	let score = base;
	let symmetryScore: number | null = null;

	// symmetry can only add to a subject that is already centered
	const grid = centered && pixels ? await sampleLuma(pixels, cfg.symmetry.sampleSize) : null;
	if (grid) {
		symmetryScore = mirrorSimilarity(grid);
		score =
			base * (1 - cfg.center.symmetryWeight) +
			symmetryScore * cfg.center.symmetryWeight;
	}
	score = clamp01(score);
	const symmetryBonus =
		symmetryScore !== null && symmetryScore > cfg.center.symmetryBonusThreshold;

	let status: CompositionStatus;
	if (!centered) status = "NeedsAdjustment";
	else if (symmetryBonus) status = "Perfect";
	else status = "Good";

	const hint = directionHint(dx, dy, cfg.center.directionThreshold);
	let suggestion: string;
	if (status === "Perfect") {
		suggestion = hint ? `Almost perfect: ${hint.toLowerCase()}` : "Perfect!";
	} else if (status === "Good") {
		suggestion = hint ? `Nice center! ${hint} slightly` : "Nice center!";
	} else {
		// a small centered subject always has a lot of headroom, so only clipping counts here
		suggestion = edgeSuggestion(context) ?? cutoffSuggestion(context) ?? hint ?? "Almost there";
	}

	const details: CenterDetails = {
		rule: "center_framing",
		distance,
		centered,
		symmetryScore,
		symmetryBonus,
	};

	return {
		compositionType: "center_framing",
		score,
		status,
		suggestion,
		context,
		details,
	};
}
