import { describe, expect, it } from "vitest";
import { feedbackFor } from "../feedback";
import { NEUTRAL_CONTEXT } from "../manager";
import { toJSON, toJSONString } from "../serialize";
import type { CompositionContext, CompositionResult } from "../types";

function result(overrides: Partial<CompositionResult>, context: Partial<CompositionContext> = {}): CompositionResult {
	return {
		compositionType: "rule_of_thirds",
		score: 0.8449,
		status: "Good",
		suggestion: "Move subject slightly right to align with top-right third.",
		context: { ...NEUTRAL_CONTEXT, subjectSize: "medium", offsetX: -0.1523, offsetY: 0.0461, ...context },
		details: {
			rule: "rule_of_thirds",
			nearestQuadrant: "top-right",
			intersectionScore: 0.8449,
			lineScore: 0.5,
			tolerance: 0.15,
		},
		...overrides,
	};
}

describe("toJSON", () => {
	it("produces the logging shape with two-decimal numbers", () => {
		expect(toJSON(result({}))).toEqual({
			composition: "rule_of_thirds",
			score: 0.84,
			status: "Good",
			suggestion: "Move subject slightly right to align with top-right third.",
			context: {
				subjectSize: "medium",
				subjectOffsetX: -0.15,
				subjectOffsetY: 0.05,
				multipleSubjects: false,
			},
		});
	});

	it("round-trips through a JSON string", () => {
		expect(JSON.parse(toJSONString(result({})))).toEqual(toJSON(result({})));
	});
});

describe("feedbackFor", () => {
	it("grades perfect as level 1 in green", () => {
		expect(feedbackFor(result({ status: "Perfect", suggestion: "Perfect!" }))).toEqual({
			icon: "check",
			level: 1,
			color: "#38b000",
		});
	});

	it("separates good from good-with-a-nudge", () => {
		expect(feedbackFor(result({ suggestion: "Nice center!" }))).toMatchObject({
			icon: "thumbs-up",
			level: 2,
		});
		expect(feedbackFor(result({ suggestion: "Nice center! Move right slightly" }))).toMatchObject({
			icon: "arrow-right",
			level: 3,
		});
	});

	it("grades directional, distance and cut-off adjustments", () => {
		const adjust = { status: "NeedsAdjustment" as const };
		expect(feedbackFor(result({ ...adjust, suggestion: "Move left and down" }))).toMatchObject({
			icon: "arrow-down-left",
			level: 4,
		});
		expect(
			feedbackFor(result({ ...adjust, suggestion: "Step back: subject is too close to the top edge" })),
		).toMatchObject({ icon: "step-back", level: 5 });
		expect(
			feedbackFor(result({ ...adjust, suggestion: "Get closer, then move to bottom-left third" })),
		).toMatchObject({ icon: "get-closer", level: 5 });
		expect(
			feedbackFor(
				result(
					{ ...adjust, suggestion: "Move to bottom-left third" },
					{ headroom: { ratio: 0.3, excessive: false, cutoff: true, optimalForPortrait: false } },
				),
			),
		).toMatchObject({ icon: "subject-cut", level: 6 });
	});
});
