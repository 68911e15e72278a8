import chalk from "chalk";
import {
	type BoundingBox,
	EMPTY_BOX,
	type Frame,
	type SubjectObservation,
} from "../composition/types";
import { clamp01 } from "../utils";

export type Candidate = {
	boundingBox: BoundingBox;
	confidence: number;
};

/** One detection tier. Boxes are normalized to the frame, origin top-left. */
export interface CandidateDetector {
	readonly kind: "face" | "human";
	detect(frame: Frame): Promise<Candidate[]>;
}

export const NO_SUBJECT: SubjectObservation = Object.freeze({
	boundingBox: EMPTY_BOX,
	kind: "none",
	confidence: 0,
	candidateCount: 0,
});

function clampBox(box: BoundingBox): BoundingBox {
	const x = clamp01(box.x);
	const y = clamp01(box.y);
	return {
		x,
		y,
		width: clamp01(Math.min(box.width, 1 - x)),
		height: clamp01(Math.min(box.height, 1 - y)),
	};
}

/** Highest confidence wins; ties go to the larger box. */
export function pickPrimary(candidates: Candidate[]): Candidate | null {
	if (!candidates.length) return null;
	return candidates.reduce((a, b) => {
		if (a.confidence !== b.confidence) return a.confidence > b.confidence ? a : b;
		const aa = a.boundingBox.width * a.boundingBox.height;
		const ba = b.boundingBox.width * b.boundingBox.height;
		return aa >= ba ? a : b;
	});
}

/**
 * Runs the tiers in priority order (faces before humans) and reports at most one
 * subject. A failing tier counts as empty; detection never rejects.
 */
export class SubjectDetector {
	private readonly tiers: CandidateDetector[];
	private readonly warned = new Set<CandidateDetector>();

	constructor(tiers: { face?: CandidateDetector; human?: CandidateDetector }) {
		this.tiers = [tiers.face, tiers.human].filter(
			(t): t is CandidateDetector => t !== undefined,
		);
	}

	async detect(frame: Frame): Promise<SubjectObservation> {
		for (const tier of this.tiers) {
			const candidates = await this.runTier(tier, frame);
			const primary = pickPrimary(candidates);
			if (!primary) continue;

			return Object.freeze({
				boundingBox: Object.freeze(clampBox(primary.boundingBox)),
				kind: tier.kind,
				confidence: clamp01(primary.confidence),
				candidateCount: candidates.length,
			});
		}
		return NO_SUBJECT;
	}

	private async runTier(tier: CandidateDetector, frame: Frame): Promise<Candidate[]> {
		try {
			return await tier.detect(frame);
		} catch (err) {
			if (!this.warned.has(tier)) {
				this.warned.add(tier);
				console.warn(
					chalk.yellow(`⚠️ ${tier.kind} detector unavailable, skipping:`),
					err instanceof Error ? err.message : String(err),
				);
			}
			return [];
		}
	}
}
