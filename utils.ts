import fg from "fast-glob";
import path from "node:path";

export function clamp01(x: number): number {
	return Math.max(0, Math.min(1, x));
}

export function round2(x: number): number {
	return Math.round(x * 100) / 100;
}

function buildGlobPattern(exts: string[]): string {
	return `*.{${exts.join(",")}}`;
}

export async function getFilesInFolder(
	cwd: string,
	exts: string[],
): Promise<string[]> {
	const pattern = buildGlobPattern(exts);
	const filesRel = await fg([pattern], {
		cwd: cwd,
		onlyFiles: true,
		unique: true,
		dot: false,
		caseSensitiveMatch: false,
	});
	return filesRel.sort().map((f) => path.join(cwd, f));
}
