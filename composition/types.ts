export type CompositionType = "rule_of_thirds" | "center_framing" | "symmetry";

/** Fixed priority order, also used to break score ties */
export const COMPOSITION_TYPES: readonly CompositionType[] = [
	"rule_of_thirds",
	"center_framing",
	"symmetry",
];

export const DISPLAY_NAMES: Readonly<Record<CompositionType, string>> = {
	rule_of_thirds: "Rule of Thirds",
	center_framing: "Center Framing",
	symmetry: "Symmetry",
};

export function isCompositionType(value: string): value is CompositionType {
	return (COMPOSITION_TYPES as readonly string[]).includes(value);
}

export type Size = { width: number; height: number };

/** Raw interleaved pixels, as produced by sharp's `.raw()` output */
export type PixelData = {
	data: Uint8Array;
	width: number;
	height: number;
	channels: 1 | 2 | 3 | 4;
};

export type Frame = Size & {
	pixels?: PixelData;
};

/** Normalized rect in [0,1], origin top-left */
export type BoundingBox = {
	x: number;
	y: number;
	width: number;
	height: number;
};

export const EMPTY_BOX: Readonly<BoundingBox> = { x: 0, y: 0, width: 0, height: 0 };

export type SubjectKind = "face" | "human" | "none";

export type SubjectObservation = {
	readonly boundingBox: Readonly<BoundingBox>;
	readonly kind: SubjectKind;
	readonly confidence: number; // 0..1
	/** candidates found by the tier that produced this subject */
	readonly candidateCount?: number;
};

export type SubjectSize = "small" | "medium" | "large";

export type Edge = "top" | "bottom" | "left" | "right";

export type EdgeProximity = {
	tooClose: boolean;
	dangerousEdges: Edge[];
	marginFraction: number;
};

export type Headroom = {
	ratio: number;
	excessive: boolean;
	cutoff: boolean;
	optimalForPortrait: boolean;
};

export type CompositionContext = {
	subjectSize: SubjectSize;
	offsetX: number; // signed, fraction of frame from center
	offsetY: number;
	edgeProximity: EdgeProximity;
	headroom: Headroom;
	multipleSubjects: boolean;
	/** set when a rule had to score from degraded input */
	reducedConfidence?: boolean;
};

export type CompositionStatus = "Perfect" | "Good" | "NeedsAdjustment";

export type Balance = "left-weighted" | "right-weighted" | "balanced";

export type Quadrant = "top-left" | "top-right" | "bottom-left" | "bottom-right";

export type ThirdsDetails = {
	rule: "rule_of_thirds";
	nearestQuadrant: Quadrant;
	intersectionScore: number;
	lineScore: number;
	tolerance: number;
};

export type CenterDetails = {
	rule: "center_framing";
	distance: number;
	centered: boolean;
	symmetryScore: number | null;
	symmetryBonus: boolean;
};

export type SymmetryDetails = {
	rule: "symmetry";
	similarity: number;
	balance: Balance;
	centering: number;
};

export type NeutralDetails = {
	rule: "none";
	reason: "disabled" | "no-subject";
};

export type ResultDetails =
	| ThirdsDetails
	| CenterDetails
	| SymmetryDetails
	| NeutralDetails;

export type CompositionResult = {
	compositionType: CompositionType;
	score: number; // 0..1
	status: CompositionStatus;
	suggestion: string;
	context: CompositionContext;
	details: ResultDetails;
};
