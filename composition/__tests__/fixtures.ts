import type { BoundingBox, PixelData, SubjectObservation } from "../types";

export const FRAME_1000 = { width: 1000, height: 1000 };

export function subjectAt(
	cx: number,
	cy: number,
	size = 0.1,
	kind: "face" | "human" = "face",
): SubjectObservation {
	const boundingBox: BoundingBox = {
		x: cx - size / 2,
		y: cy - size / 2,
		width: size,
		height: size,
	};
	return { boundingBox, kind, confidence: 0.9 };
}

function grey(width: number, height: number, shade: (x: number, y: number) => number): PixelData {
	const data = new Uint8Array(width * height * 3);
	for (let y = 0; y < height; y++) {
		for (let x = 0; x < width; x++) {
			const v = shade(x, y);
			const i = (y * width + x) * 3;
			data[i] = v;
			data[i + 1] = v;
			data[i + 2] = v;
		}
	}
	return { data, width, height, channels: 3 };
}

/** Brightness depends only on distance from the center column, so each row mirrors */
export function mirroredPixels(width = 64, height = 64): PixelData {
	return grey(width, height, (x, y) => {
		const fromEdge = Math.min(x, width - 1 - x);
		return (fromEdge * 7 + y * 3) % 256;
	});
}

export function splitPixels(left: number, right: number, width = 64, height = 64): PixelData {
	return grey(width, height, (x) => (x < width / 2 ? left : right));
}
