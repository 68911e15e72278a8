import sharp from "sharp";
import type { Frame, Size } from "../composition/types";

export function isValidFrame(size: Size): boolean {
	return (
		Number.isFinite(size.width) &&
		Number.isFinite(size.height) &&
		size.width > 0 &&
		size.height > 0
	);
}

/**
 * Decode an image file into an RGB frame, auto-oriented and scaled down so the
 * longest side is at most `maxDim`.
 */
export async function loadFrameFromFile(
	filePath: string,
	maxDim: number,
): Promise<Frame> {
	const img = sharp(filePath, { failOn: "none" }).rotate(); // auto-orient
	const meta = await img.metadata();
	const { width = 0, height = 0 } = meta;
	if (!width || !height) {
		throw new Error(`Unreadable image: ${filePath}`);
	}

	const { data, info } = await img
		.resize(maxDim, maxDim, { fit: "inside", withoutEnlargement: true })
		.removeAlpha()
		.toColourspace("srgb")
		.raw()
		.toBuffer({ resolveWithObject: true });

	return {
		width: info.width,
		height: info.height,
		pixels: {
			data,
			width: info.width,
			height: info.height,
			channels: info.channels,
		},
	};
}
