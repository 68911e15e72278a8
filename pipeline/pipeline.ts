import chalk from "chalk";
import { type CompositionConfig, DEFAULT_CONFIG } from "../config";
import type { CompositionManager } from "../composition/manager";
import { generateOverlays, type OverlayElement } from "../composition/overlay";
import type {
	CompositionResult,
	Frame,
	SubjectObservation,
} from "../composition/types";
import type { SubjectDetector } from "../detect/detector";
import { isValidFrame } from "../detect/frame";
import { FrameThrottle } from "./throttle";

export type CameraFrame = Frame & {
	/** capture time in milliseconds */
	timestamp: number;
};

export type Publication = {
	sequence: number;
	observation: SubjectObservation;
	result: CompositionResult;
	overlays: OverlayElement[];
	elapsedMs: number;
};

export type PublicationListener = (publication: Publication) => void;

export type PipelineOptions = {
	detector: SubjectDetector;
	manager: CompositionManager;
	/** supplies throttle cadence and time budget when those are not given */
	config?: CompositionConfig;
	throttle?: FrameThrottle;
	/** soft end-to-end budget per evaluation in milliseconds */
	budgetMs?: number;
	now?: () => number;
};

/**
 * Camera frames in, composition feedback out. Evaluations may overlap; results
 * are last-writer-wins by frame sequence, so a slow older frame that finishes
 * after a newer one is dropped instead of published.
 */
export class CompositionPipeline {
	private readonly detector: SubjectDetector;
	private readonly manager: CompositionManager;
	private readonly throttle: FrameThrottle;
	private readonly budgetMs: number;
	private readonly now: () => number;
	private readonly listeners = new Set<PublicationListener>();

	private sequence = 0;
	private latest: Publication | null = null;

	constructor(opts: PipelineOptions) {
		this.detector = opts.detector;
		this.manager = opts.manager;
		const cfg = opts.config ?? DEFAULT_CONFIG;
		this.throttle =
			opts.throttle ??
			new FrameThrottle({ interval: cfg.frameInterval, warmupMs: cfg.warmupMs });
		this.budgetMs = opts.budgetMs ?? cfg.budgetMs;
		this.now = opts.now ?? (() => performance.now());
	}

	get latestPublication(): Publication | null {
		return this.latest;
	}

	onPublish(listener: PublicationListener): () => void {
		this.listeners.add(listener);
		return () => {
			this.listeners.delete(listener);
		};
	}

	/**
	 * Offer a camera frame. Resolves to the publication, or null when the frame was
	 * throttled, invalid or superseded.
	 */
	submit(frame: CameraFrame): Promise<Publication | null> {
		const sequence = ++this.sequence;
		if (!this.throttle.shouldProcess(frame.timestamp)) {
			return Promise.resolve(null);
		}
		return this.process(frame, sequence);
	}

	async process(frame: Frame, sequence: number): Promise<Publication | null> {
		if (!isValidFrame(frame)) return null;
		const started = this.now();

		const observation = await this.detector.detect(frame);
		const result = await this.manager.evaluate(observation, frame, frame.pixels, {
			sequence,
		});
		if (!result) return null;

		// neutral results (disabled, no subject) only get the static guide
		const overlays =
			result.details.rule === "none"
				? this.manager.getBasicOverlays(frame)
				: generateOverlays(result, result.context, frame);

		const elapsedMs = this.now() - started;
		if (elapsedMs > this.budgetMs) {
			console.warn(
				chalk.yellow(
					`⏱️ Frame ${sequence} took ${elapsedMs.toFixed(1)}ms (budget ${this.budgetMs}ms)`,
				),
			);
		}

		if (this.latest && this.latest.sequence > sequence) return null;

		const publication: Publication = {
			sequence,
			observation,
			result,
			overlays,
			elapsedMs,
		};
		this.latest = publication;
		for (const listener of this.listeners) listener(publication);
		return publication;
	}
}
