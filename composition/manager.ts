import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import { isValidFrame } from "../detect/frame";
import { basicOverlays, type OverlayElement } from "./overlay";
import { evaluateRule } from "./service";
import {
	COMPOSITION_TYPES,
	type CompositionContext,
	type CompositionResult,
	type CompositionType,
	type NeutralDetails,
	type PixelData,
	type Size,
	type SubjectObservation,
} from "./types";

export type ManagerState = Readonly<{
	currentCompositionType: CompositionType;
	isEnabled: boolean;
	lastResult: CompositionResult | null;
}>;

export type ManagerListener = (state: ManagerState) => void;

export type EvaluateOptions = {
	/** Frame sequence number; older frames never overwrite newer results */
	sequence?: number;
};

export type BestComposition = {
	type: CompositionType;
	score: number;
	results: CompositionResult[];
};

export const NEUTRAL_CONTEXT: Readonly<CompositionContext> = {
	subjectSize: "small",
	offsetX: 0,
	offsetY: 0,
	edgeProximity: { tooClose: false, dangerousEdges: [], marginFraction: 0.5 },
	headroom: { ratio: 0, excessive: false, cutoff: false, optimalForPortrait: false },
	multipleSubjects: false,
};

function neutralResult(
	type: CompositionType,
	reason: NeutralDetails["reason"],
): CompositionResult {
	return {
		compositionType: type,
		score: 0,
		status: "NeedsAdjustment",
		suggestion: "",
		context: {
			...NEUTRAL_CONTEXT,
			edgeProximity: { ...NEUTRAL_CONTEXT.edgeProximity, dangerousEdges: [] },
			headroom: { ...NEUTRAL_CONTEXT.headroom },
		},
		details: { rule: "none", reason },
	};
}

/**
 * Holds the active rule, the enabled flag and the last published result. Every
 * mutation goes through this class; readers get immutable snapshots.
 */
export class CompositionManager {
	private state: ManagerState;
	private lastSequence = Number.NEGATIVE_INFINITY;
	private readonly listeners = new Set<ManagerListener>();

	constructor(
		private readonly config: CompositionConfig = DEFAULT_CONFIG,
		initial: { compositionType?: CompositionType; enabled?: boolean } = {},
	) {
		this.state = {
			currentCompositionType: initial.compositionType ?? "rule_of_thirds",
			isEnabled: initial.enabled ?? true,
			lastResult: null,
		};
	}

	get currentCompositionType(): CompositionType {
		return this.state.currentCompositionType;
	}

	get isEnabled(): boolean {
		return this.state.isEnabled;
	}

	get lastResult(): CompositionResult | null {
		return this.state.lastResult;
	}

	snapshot(): ManagerState {
		return this.state;
	}

	subscribe(listener: ManagerListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	private publish(next: Partial<ManagerState>): ManagerState {
		this.state = Object.freeze({ ...this.state, ...next });
		for (const listener of this.listeners) listener(this.state);
		return this.state;
	}

	/** Takes effect on the next evaluation; the stored result is left as is */
	switchToCompositionType(type: CompositionType): ManagerState {
		if (type === this.state.currentCompositionType) return this.state;
		return this.publish({ currentCompositionType: type });
	}

	setEnabled(enabled: boolean): ManagerState {
		if (enabled === this.state.isEnabled) return this.state;
		return this.publish(
			enabled ? { isEnabled: true } : { isEnabled: false, lastResult: null },
		);
	}

	toggleEnabled(): ManagerState {
		return this.setEnabled(!this.state.isEnabled);
	}

	/**
	 * Scores the subject with the active rule. Resolves to null for a degenerate
	 * frame, which callers treat as "skip this frame".
	 */
	async evaluate(
		observation: SubjectObservation,
		frameSize: Size,
		pixels?: PixelData,
		options: EvaluateOptions = {},
	): Promise<CompositionResult | null> {
		if (!isValidFrame(frameSize)) return null;

		const type = this.state.currentCompositionType;
		let result: CompositionResult;
		if (!this.state.isEnabled) {
			result = neutralResult(type, "disabled");
		} else if (observation.kind === "none") {
			result = neutralResult(type, "no-subject");
		} else {
			result = await evaluateRule(type, observation, frameSize, pixels, this.config);
		}

		this.store(result, options.sequence);
		return result;
	}

	private store(result: CompositionResult, sequence: number | undefined) {
		// a result that finishes after the engine was switched off is not shown
		if (!this.state.isEnabled) return;
		if (sequence !== undefined) {
			if (sequence < this.lastSequence) return;
			this.lastSequence = sequence;
		}
		this.publish({ lastResult: result });
	}

	/** Scores every rule without touching the stored state */
	async getAllCompositionScores(
		observation: SubjectObservation,
		frameSize: Size,
		pixels?: PixelData,
	): Promise<Record<CompositionType, number> | null> {
		const results = await this.evaluateAll(observation, frameSize, pixels);
		if (!results) return null;
		return {
			rule_of_thirds: results[0]?.score ?? 0,
			center_framing: results[1]?.score ?? 0,
			symmetry: results[2]?.score ?? 0,
		};
	}

	/**
	 * Recommends the rule with the highest score. Ties go to the earlier rule in
	 * thirds, center, symmetry order. Null when there is nothing to score.
	 */
	async getBestCompositionSuggestion(
		observation: SubjectObservation,
		frameSize: Size,
		pixels?: PixelData,
	): Promise<BestComposition | null> {
		const results = await this.evaluateAll(observation, frameSize, pixels);
		if (!results) return null;

		let best: CompositionResult | undefined;
		for (const result of results) {
			if (!best || result.score > best.score) best = result;
		}
		if (!best) return null;
		return { type: best.compositionType, score: best.score, results };
	}

	private async evaluateAll(
		observation: SubjectObservation,
		frameSize: Size,
		pixels?: PixelData,
	): Promise<CompositionResult[] | null> {
		if (!isValidFrame(frameSize) || observation.kind === "none") return null;
		return Promise.all(
			COMPOSITION_TYPES.map((type) =>
				evaluateRule(type, observation, frameSize, pixels, this.config),
			),
		);
	}

	getBasicOverlays(frameSize: Size): OverlayElement[] {
		if (!this.state.isEnabled || !isValidFrame(frameSize)) return [];
		return basicOverlays(this.state.currentCompositionType, frameSize);
	}
}
