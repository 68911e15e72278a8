import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import { clamp01 } from "../utils";
import { centeringScore } from "./center";
import { analyzeContext, boxCenter, cutoffSuggestion, edgeSuggestion } from "./context";
import { classifyBalance, mirrorSimilarity, sampleLuma } from "./luminance";
import type {
	Balance,
	CompositionResult,
	CompositionStatus,
	PixelData,
	Size,
	SubjectObservation,
	SymmetryDetails,
} from "./types";

/** Without pixels, balance is read from where the subject sits horizontally */
function balanceFromBox(centerX: number, threshold: number): Balance {
	if (centerX < 0.5 - threshold) return "left-weighted";
	if (centerX > 0.5 + threshold) return "right-weighted";
	return "balanced";
}

function symmetryStatus(
	similarity: number,
	centering: number,
	cfg: CompositionConfig,
): CompositionStatus {
	if (similarity > cfg.symmetry.perfect && centering > cfg.symmetry.centeringPerfect) {
		return "Perfect";
	}
	if (similarity > cfg.symmetry.good) return "Good";
	return "NeedsAdjustment";
}

/**
 * Whole-frame mirror symmetry. Guidance is about camera pan and level rather than
 * subject placement.
 */
export async function evaluateSymmetry(
	subject: SubjectObservation,
	frameSize: Size,
	pixels: PixelData | undefined,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): Promise<CompositionResult> {
	const context = analyzeContext(subject, frameSize, cfg);
	const { x, y } = boxCenter(subject.boundingBox);
	const distance = Math.hypot(x - 0.5, y - 0.5);
	const centering = clamp01(1 - distance * 4);

	let similarity: number;
	let balance: Balance;
	const grid = pixels ? await sampleLuma(pixels, cfg.symmetry.sampleSize) : null;
	if (grid) {
		similarity = mirrorSimilarity(grid);
		balance = classifyBalance(grid, cfg.symmetry.balanceThreshold);
	} else {
		// geometry-only approximation, for missing or unreadable pixels
		similarity = centeringScore(distance, cfg.center.tolerance);
		balance = balanceFromBox(x, cfg.symmetry.balanceThreshold);
		context.reducedConfidence = true;
	}

	const score = clamp01(similarity);
	const status = symmetryStatus(score, centering, cfg);

	let suggestion: string;
	if (status === "Perfect") {
		suggestion = "So balanced!";
	} else if (status === "Good") {
		suggestion = balance === "balanced" ? "Well balanced" : "Good balance";
	} else {
		const framing = edgeSuggestion(context) ?? cutoffSuggestion(context);
		if (framing) suggestion = framing;
		else if (balance === "left-weighted") suggestion = "Pan left to rebalance the frame";
		else if (balance === "right-weighted") suggestion = "Pan right to rebalance the frame";
		else suggestion = "Level the camera and recenter on the line of symmetry";
	}

	const details: SymmetryDetails = {
		rule: "symmetry",
		similarity: score,
		balance,
		centering,
	};

	return {
		compositionType: "symmetry",
		score,
		status,
		suggestion,
		context,
		details,
	};
}
