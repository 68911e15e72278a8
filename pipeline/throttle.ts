export type ThrottleOptions = {
	/** evaluate every Nth frame, default 3 */
	interval?: number;
	/** ignore frames for this long after the first one, default 1000 */
	warmupMs?: number;
};

/**
 * Decides which camera frames get analyzed: nothing during sensor warm-up, then
 * one frame in every `interval`.
 */
export class FrameThrottle {
	private readonly interval: number;
	private readonly warmupMs: number;
	private startedAt: number | null = null;
	private counted = 0;

	constructor(opts: ThrottleOptions = {}) {
		this.interval = Math.max(1, Math.floor(opts.interval ?? 3));
		this.warmupMs = Math.max(0, opts.warmupMs ?? 1000);
	}

	/** Marks camera start; otherwise the first offered frame does. */
	start(nowMs: number): void {
		this.startedAt = nowMs;
		this.counted = 0;
	}

	reset(): void {
		this.startedAt = null;
		this.counted = 0;
	}

	shouldProcess(nowMs: number): boolean {
		if (this.startedAt === null) this.startedAt = nowMs;
		if (nowMs - this.startedAt < this.warmupMs) return false;

		this.counted++;
		return this.counted % this.interval === 0;
	}
}
