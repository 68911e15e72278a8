import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterAll, beforeAll, describe, expect, it, vi } from "vitest";
import { ensureFaceApi } from "../vision";

const mocks = vi.hoisted(() => ({
	setBackend: vi.fn(async () => true),
	ready: vi.fn(async () => {}),
	loadFromDisk: vi.fn(async () => {}),
}));

vi.mock("@tensorflow/tfjs", () => ({ setBackend: mocks.setBackend, ready: mocks.ready }));
vi.mock("@tensorflow/tfjs-backend-wasm", () => ({}));
vi.mock("@vladmandic/face-api/dist/face-api.node-wasm.js", () => ({
	nets: { ssdMobilenetv1: { loadFromDisk: mocks.loadFromDisk } },
}));

describe("ensureFaceApi", () => {
	let modelsDir: string;

	beforeAll(async () => {
		modelsDir = await fs.mkdtemp(path.join(os.tmpdir(), "models-"));
	});

	afterAll(async () => {
		await fs.rm(modelsDir, { recursive: true, force: true });
	});

	it("loads the backend and the model once for overlapping callers", async () => {
		const [a, b, c] = await Promise.all([
			ensureFaceApi(modelsDir),
			ensureFaceApi(modelsDir),
			ensureFaceApi(modelsDir),
		]);
		expect(b).toBe(a);
		expect(c).toBe(a);
		expect(mocks.setBackend).toHaveBeenCalledTimes(1);
		expect(mocks.setBackend).toHaveBeenCalledWith("wasm");
		expect(mocks.ready).toHaveBeenCalledTimes(1);
		expect(mocks.loadFromDisk).toHaveBeenCalledTimes(1);
		expect(mocks.loadFromDisk).toHaveBeenCalledWith(modelsDir);
	});

	it("reuses a loaded model directory", async () => {
		await ensureFaceApi(modelsDir);
		expect(mocks.loadFromDisk).toHaveBeenCalledTimes(1);
	});

	it("rejects a missing models directory and retries it on the next call", async () => {
		const missing = path.join(modelsDir, "missing");
		await expect(ensureFaceApi(missing)).rejects.toThrow(`Models directory not found: ${missing}`);

		await fs.mkdir(missing);
		await ensureFaceApi(missing);
		expect(mocks.loadFromDisk).toHaveBeenLastCalledWith(missing);
		expect(mocks.setBackend).toHaveBeenCalledTimes(1);
	});
});
