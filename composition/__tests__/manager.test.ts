import { describe, expect, it, vi } from "vitest";
import { NO_SUBJECT } from "../../detect/detector";
import { CompositionManager, type ManagerState } from "../manager";
import { FRAME_1000 as FRAME, subjectAt } from "./fixtures";

describe("CompositionManager", () => {
	it("starts enabled on rule of thirds with no result", () => {
		const manager = new CompositionManager();
		expect(manager.currentCompositionType).toBe("rule_of_thirds");
		expect(manager.isEnabled).toBe(true);
		expect(manager.lastResult).toBeNull();
	});

	it("dispatches to the active rule and stores the result", async () => {
		const manager = new CompositionManager();
		const result = await manager.evaluate(subjectAt(0.33, 0.33), FRAME);
		expect(result?.compositionType).toBe("rule_of_thirds");
		expect(result?.status).toBe("Perfect");
		expect(manager.lastResult).toBe(result);
	});

	it("skips degenerate frames", async () => {
		const manager = new CompositionManager();
		expect(await manager.evaluate(subjectAt(0.5, 0.5), { width: 0, height: 720 })).toBeNull();
		expect(await manager.evaluate(subjectAt(0.5, 0.5), { width: 1280, height: -1 })).toBeNull();
		expect(manager.lastResult).toBeNull();
	});

	it("returns a neutral result while disabled", async () => {
		const manager = new CompositionManager(undefined, { enabled: false });
		const result = await manager.evaluate(subjectAt(0.33, 0.33), FRAME);
		expect(result).toMatchObject({
			score: 0,
			status: "NeedsAdjustment",
			suggestion: "",
			details: { rule: "none", reason: "disabled" },
		});
		expect(manager.lastResult).toBeNull();
	});

	it("returns a neutral result when there is no subject", async () => {
		const manager = new CompositionManager();
		const result = await manager.evaluate(NO_SUBJECT, FRAME);
		expect(result).toMatchObject({ suggestion: "", details: { reason: "no-subject" } });
		expect(result?.context.edgeProximity.tooClose).toBe(false);
	});

	it("uses a newly selected rule on the next evaluation only", async () => {
		const manager = new CompositionManager();
		const first = await manager.evaluate(subjectAt(0.5, 0.5), FRAME);

		manager.switchToCompositionType("center_framing");
		expect(manager.lastResult).toBe(first);
		expect(manager.lastResult?.compositionType).toBe("rule_of_thirds");

		const second = await manager.evaluate(subjectAt(0.5, 0.5), FRAME);
		expect(second?.compositionType).toBe("center_framing");
		expect(second?.status).toBe("Good");
	});

	it("clears the result when switched off", async () => {
		const manager = new CompositionManager();
		await manager.evaluate(subjectAt(0.5, 0.5), FRAME);
		manager.toggleEnabled();
		expect(manager.isEnabled).toBe(false);
		expect(manager.lastResult).toBeNull();
		expect(manager.getBasicOverlays(FRAME)).toEqual([]);
	});

	it("keeps the newest frame's result when an older one finishes later", async () => {
		const manager = new CompositionManager();
		const newer = await manager.evaluate(subjectAt(0.33, 0.33), FRAME, undefined, { sequence: 2 });
		const older = await manager.evaluate(subjectAt(0.5, 0.5), FRAME, undefined, { sequence: 1 });
		expect(older?.status).toBe("NeedsAdjustment");
		expect(manager.lastResult).toBe(newer);
	});

	it("notifies subscribers with snapshots until they unsubscribe", async () => {
		const manager = new CompositionManager();
		const seen: ManagerState[] = [];
		const unsubscribe = manager.subscribe((state) => seen.push(state));

		manager.switchToCompositionType("symmetry");
		await manager.evaluate(subjectAt(0.5, 0.5), FRAME);
		unsubscribe();
		manager.switchToCompositionType("center_framing");

		expect(seen).toHaveLength(2);
		expect(seen[0]?.currentCompositionType).toBe("symmetry");
		expect(seen[0]?.lastResult).toBeNull();
		expect(seen[1]?.lastResult?.compositionType).toBe("symmetry");
		expect(Object.isFrozen(seen[1])).toBe(true);
	});

	it("does not notify when nothing changes", () => {
		const manager = new CompositionManager();
		const listener = vi.fn();
		manager.subscribe(listener);
		manager.switchToCompositionType("rule_of_thirds");
		manager.setEnabled(true);
		expect(listener).not.toHaveBeenCalled();
	});

	describe("getBestCompositionSuggestion", () => {
		it("recommends thirds for a subject on an intersection", async () => {
			const manager = new CompositionManager();
			const best = await manager.getBestCompositionSuggestion(subjectAt(1 / 3, 1 / 3), FRAME);
			expect(best?.type).toBe("rule_of_thirds");
			expect(best?.results.map((r) => r.compositionType)).toEqual([
				"rule_of_thirds",
				"center_framing",
				"symmetry",
			]);
		});

		it("breaks a tie in favor of the earlier rule", async () => {
			const manager = new CompositionManager();
			// without pixels, center framing and symmetry both score 1 for a centered subject
			const best = await manager.getBestCompositionSuggestion(subjectAt(0.5, 0.5), FRAME);
			expect(best?.results[1]?.score).toBe(best?.results[2]?.score);
			expect(best?.type).toBe("center_framing");
		});

		it("leaves the stored result alone", async () => {
			const manager = new CompositionManager();
			await manager.getBestCompositionSuggestion(subjectAt(0.5, 0.5), FRAME);
			expect(manager.lastResult).toBeNull();
		});

		it("still recommends when the pixels cannot be read", async () => {
			vi.spyOn(console, "warn").mockImplementation(() => {});
			const manager = new CompositionManager();
			const broken = { data: new Uint8Array(10), width: 64, height: 64, channels: 3 as const };
			const best = await manager.getBestCompositionSuggestion(subjectAt(1 / 3, 1 / 3), FRAME, broken);
			expect(best?.type).toBe("rule_of_thirds");
			expect(best?.results[2]?.context.reducedConfidence).toBe(true);
			vi.restoreAllMocks();
		});

		it("has nothing to recommend without a subject", async () => {
			const manager = new CompositionManager();
			expect(await manager.getBestCompositionSuggestion(NO_SUBJECT, FRAME)).toBeNull();
		});
	});

	it("reports a score for every rule", async () => {
		const manager = new CompositionManager();
		const scores = await manager.getAllCompositionScores(subjectAt(0.5, 0.5), FRAME);
		expect(scores?.rule_of_thirds).toBe(0);
		expect(scores?.center_framing).toBeCloseTo(1);
		expect(scores?.symmetry).toBeCloseTo(1);
	});

	it("serves the grid as the basic overlay for rule of thirds", () => {
		const manager = new CompositionManager();
		const overlays = manager.getBasicOverlays(FRAME);
		expect(overlays).toHaveLength(1);
		expect(overlays[0]?.type).toBe("grid");
	});
});
