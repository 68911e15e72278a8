// detect/vision.ts
import fs from "node:fs/promises";

type FaceApi = typeof import("@vladmandic/face-api");
type Tf = typeof import("@tensorflow/tfjs");

// The node-wasm bundle runs on @tensorflow/tfjs with the wasm backend, so no
// native TensorFlow binary is needed.
const FACE_API_MODULE = "@vladmandic/face-api/dist/face-api.node-wasm.js";

export type Vision = { faceapi: FaceApi; tf: Tf };

// In-flight loads are shared, so overlapping first detections load everything once.
let runtime: Promise<Vision> | null = null;
const models = new Map<string, Promise<void>>();

async function loadRuntime(): Promise<Vision> {
	const tf = await import("@tensorflow/tfjs");
	await import("@tensorflow/tfjs-backend-wasm");
	const faceapi: FaceApi = await import(FACE_API_MODULE);
	await tf.setBackend("wasm");
	await tf.ready();
	return { faceapi, tf };
}

async function loadModels(faceapi: FaceApi, modelsDir: string): Promise<void> {
	// Validate models dir exists to keep errors readable
	const stat = await fs.stat(modelsDir).catch(() => null);
	if (!stat || !stat.isDirectory()) {
		throw new Error(`Models directory not found: ${modelsDir}`);
	}
	await faceapi.nets.ssdMobilenetv1.loadFromDisk(modelsDir);
}

/** Lazily load face-api, TensorFlow.js and the SSD MobileNet face model. */
export async function ensureFaceApi(modelsDir: string): Promise<Vision> {
	// a failed load is forgotten so the next caller retries it
	const vision = await (runtime ??= loadRuntime().catch((err: unknown) => {
		runtime = null;
		throw err;
	}));

	let pending = models.get(modelsDir);
	if (!pending) {
		pending = loadModels(vision.faceapi, modelsDir).catch((err: unknown) => {
			models.delete(modelsDir);
			throw err;
		});
		models.set(modelsDir, pending);
	}
	await pending;

	return vision;
}
