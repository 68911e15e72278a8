import { describe, expect, it } from "vitest";
import { FrameThrottle } from "../throttle";

function run(throttle: FrameThrottle, times: number[]): boolean[] {
	return times.map((t) => throttle.shouldProcess(t));
}

describe("FrameThrottle", () => {
	it("ignores frames during warm-up, counted from the first frame", () => {
		const throttle = new FrameThrottle();
		expect(run(throttle, [5000, 5500, 5999])).toEqual([false, false, false]);
	});

	it("processes every third frame after warm-up", () => {
		const throttle = new FrameThrottle();
		throttle.start(0);
		expect(run(throttle, [1000, 1033, 1066, 1100, 1133, 1166])).toEqual([
			false,
			false,
			true,
			false,
			false,
			true,
		]);
	});

	it("honors a custom interval and no warm-up", () => {
		const throttle = new FrameThrottle({ interval: 2, warmupMs: 0 });
		expect(run(throttle, [0, 10, 20, 30])).toEqual([false, true, false, true]);
	});

	it("restarts warm-up after a reset", () => {
		const throttle = new FrameThrottle({ interval: 1, warmupMs: 100 });
		expect(run(throttle, [0, 100])).toEqual([false, true]);
		throttle.reset();
		expect(run(throttle, [200, 250, 300])).toEqual([false, false, true]);
	});
});
