import chalk from "chalk";
import sharp from "sharp";
import { clamp01 } from "../utils";
import type { Balance, PixelData } from "./types";

export type LumaGrid = {
	data: Uint8Array; // one luma byte per sample
	width: number;
	height: number;
};

/**
 * Downsample raw frame pixels to a small greyscale grid. The source buffer is only
 * read for the duration of the call.
 */
export async function downsampleLuma(
	pixels: PixelData,
	size: number,
): Promise<LumaGrid> {
	const { data, info } = await sharp(pixels.data, {
		raw: {
			width: pixels.width,
			height: pixels.height,
			channels: pixels.channels,
		},
	})
		.removeAlpha()
		.resize(size, size, { fit: "fill" })
		.greyscale()
		.raw()
		.toBuffer({ resolveWithObject: true });

	if (info.channels === 1) {
		return { data, width: info.width, height: info.height };
	}

	// Keep only the first channel if sharp hands back more than one
	const out = new Uint8Array(info.width * info.height);
	for (let i = 0; i < out.length; i++) {
		out[i] = data[i * info.channels] ?? 0;
	}
	return { data: out, width: info.width, height: info.height };
}

let warnedUnreadable = false;

/**
 * Like `downsampleLuma`, but resolves to null when sharp cannot read the pixels
 * (a buffer shorter than its dimensions, say). Warns on the first failure only.
 */
export async function sampleLuma(
	pixels: PixelData,
	size: number,
): Promise<LumaGrid | null> {
	try {
		return await downsampleLuma(pixels, size);
	} catch (err) {
		if (!warnedUnreadable) {
			warnedUnreadable = true;
			console.warn(
				chalk.yellow("⚠️ Frame pixels unreadable, scoring from geometry:"),
				err instanceof Error ? err.message : String(err),
			);
		}
		return null;
	}
}

/**
 * Mirror similarity around the vertical center line, in [0,1].
 * Row stride keeps roughly 32 sampled rows whatever the grid height.
 */
export function mirrorSimilarity(grid: LumaGrid): number {
	const { data, width, height } = grid;
	const half = Math.floor(width / 2);
	const rowStep = Math.max(1, Math.floor(height / 32));

	let totalDiff = 0;
	let count = 0;
	for (let y = 0; y < height; y += rowStep) {
		const row = y * width;
		for (let x = 0; x < half; x++) {
			const left = data[row + x] ?? 0;
			const right = data[row + (width - 1 - x)] ?? 0;
			totalDiff += Math.abs(left - right);
			count++;
		}
	}
	if (!count) return 0;

	const avg = totalDiff / count;
	return clamp01(1 - avg / 255);
}

/** Compares luma mass on each side of the center column; the middle column of odd widths is ignored */
export function classifyBalance(grid: LumaGrid, threshold: number): Balance {
	const { data, width, height } = grid;
	const half = Math.floor(width / 2);

	let left = 0;
	let right = 0;
	for (let y = 0; y < height; y++) {
		const row = y * width;
		for (let x = 0; x < half; x++) {
			left += data[row + x] ?? 0;
			right += data[row + (width - 1 - x)] ?? 0;
		}
	}

	const total = left + right;
	if (total === 0) return "balanced";
	const imbalance = (left - right) / total;
	if (imbalance > threshold) return "left-weighted";
	if (imbalance < -threshold) return "right-weighted";
	return "balanced";
}
