import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import { evaluateCenterFraming } from "./center";
import { evaluateSymmetry } from "./symmetry";
import { evaluateRuleOfThirds } from "./thirds";
import type {
	CompositionResult,
	CompositionType,
	PixelData,
	Size,
	SubjectObservation,
} from "./types";

export type EvaluateFn = (
	subject: SubjectObservation,
	frameSize: Size,
	pixels: PixelData | undefined,
	cfg: CompositionConfig,
) => Promise<CompositionResult>;

/** One scoring policy per rule, dispatched through a single entry point */
const SERVICES: Readonly<Record<CompositionType, EvaluateFn>> = {
	rule_of_thirds: evaluateRuleOfThirds,
	center_framing: evaluateCenterFraming,
	symmetry: evaluateSymmetry,
};

export function evaluateRule(
	type: CompositionType,
	subject: SubjectObservation,
	frameSize: Size,
	pixels?: PixelData,
	cfg: CompositionConfig = DEFAULT_CONFIG,
): Promise<CompositionResult> {
	return SERVICES[type](subject, frameSize, pixels, cfg);
}
