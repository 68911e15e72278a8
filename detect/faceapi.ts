import type { Frame } from "../composition/types";
import type { Candidate, CandidateDetector } from "./detector";
import { ensureFaceApi } from "./vision";

export type FaceApiDetectorOptions = {
	modelsDir: string;
	minConfidence?: number;
};

/** Face tier backed by face-api's SSD MobileNet v1. Needs the frame's pixels. */
export function createFaceApiDetector(opts: FaceApiDetectorOptions): CandidateDetector {
	const minConfidence = opts.minConfidence ?? 0.3;

	return {
		kind: "face",
		async detect(frame: Frame): Promise<Candidate[]> {
			const pixels = frame.pixels;
			if (!pixels || pixels.channels < 3) return [];

			const { faceapi, tf } = await ensureFaceApi(opts.modelsDir);
			const { width, height, channels } = pixels;

			// Repack to tightly-packed RGB for the tensor
			const rgb = new Int32Array(width * height * 3);
			for (let i = 0, o = 0; o < rgb.length; i += channels, o += 3) {
				rgb[o] = pixels.data[i] ?? 0;
				rgb[o + 1] = pixels.data[i + 1] ?? 0;
				rgb[o + 2] = pixels.data[i + 2] ?? 0;
			}
			const tensor = tf.tensor3d(rgb, [height, width, 3], "int32");
			try {
				const detections = await faceapi.detectAllFaces(
					tensor,
					new faceapi.SsdMobilenetv1Options({ minConfidence }),
				);
				return detections.map((d) => ({
					boundingBox: {
						x: d.box.x / width,
						y: d.box.y / height,
						width: d.box.width / width,
						height: d.box.height / height,
					},
					confidence: d.score,
				}));
			} finally {
				tensor.dispose();
			}
		},
	};
}
