import type { CompositionResult, CompositionStatus } from "./types";

/**
 * Level 1 is the best grade: 1 perfect, 2 good, 3 almost there, 4 directional
 * adjustment, 5 distance or framing adjustment, 6 critical (subject cut off).
 */
export type FeedbackLevel = 1 | 2 | 3 | 4 | 5 | 6;

export type Feedback = {
	icon: string;
	level: FeedbackLevel;
	color: string;
};

export const STATUS_COLORS: Readonly<Record<CompositionStatus, string>> = {
	Perfect: "#38b000",
	Good: "#3a86ff",
	NeedsAdjustment: "#fb8500",
};

const DIRECTION_ICONS: ReadonlyArray<[RegExp, string]> = [
	[/\b(up|top)\b.*\bleft\b|\bleft\b.*\b(up|top)\b/, "arrow-up-left"],
	[/\b(up|top)\b.*\bright\b|\bright\b.*\b(up|top)\b/, "arrow-up-right"],
	[/\b(down|bottom)\b.*\bleft\b|\bleft\b.*\b(down|bottom)\b/, "arrow-down-left"],
	[/\b(down|bottom)\b.*\bright\b|\bright\b.*\b(down|bottom)\b/, "arrow-down-right"],
	[/\bleft\b/, "arrow-left"],
	[/\bright\b/, "arrow-right"],
	[/\bup\b/, "arrow-up"],
	[/\bdown\b/, "arrow-down"],
];

function directionIcon(suggestion: string): string | null {
	const text = suggestion.toLowerCase();
	for (const [pattern, icon] of DIRECTION_ICONS) {
		if (pattern.test(text)) return icon;
	}
	return null;
}

export function feedbackFor(result: CompositionResult): Feedback {
	const { status, suggestion, context } = result;
	const color = STATUS_COLORS[status];

	if (status === "Perfect") return { icon: "check", level: 1, color };
	if (status === "Good") {
		// "Good" with a nudge still has a little way to go
		const nudge = directionIcon(suggestion);
		return nudge ? { icon: nudge, level: 3, color } : { icon: "thumbs-up", level: 2, color };
	}

	if (context.headroom.cutoff) {
		return { icon: "subject-cut", level: 6, color };
	}
	if (suggestion.startsWith("Step back")) {
		return { icon: "step-back", level: 5, color };
	}
	if (suggestion.startsWith("Get closer")) {
		return { icon: "get-closer", level: 5, color };
	}
	if (!suggestion) return { icon: "viewfinder", level: 4, color };
	return { icon: directionIcon(suggestion) ?? "target", level: 4, color };
}
