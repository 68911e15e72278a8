import chalk from "chalk";
import fs from "node:fs";
import path from "node:path";
import { hideBin } from "yargs/helpers";
import yargs from "yargs/yargs";
import { analyzeImages, type PhotoAnalysis, parseSubjectBox } from "./analyze/analyze";
import { STATUS_COLORS } from "./composition/feedback";
import { COMPOSITION_TYPES, DISPLAY_NAMES, isCompositionType } from "./composition/types";
import { resolveConfig } from "./config";
import { getFilesInFolder } from "./utils";

const DEFAULT_EXTS = ["jpg", "jpeg", "png", "webp", "heic", "avif", "heif", "tiff"];

function saveLog(json: unknown, name: string) {
	fs.writeFileSync(name, JSON.stringify(json, null, 2));
}

function printSummary(entries: PhotoAnalysis[]) {
	for (const entry of entries) {
		const name = chalk.bold(path.basename(entry.path));
		if (entry.error) {
			console.log(`${name} ${chalk.red("error")} ${chalk.dim(entry.error)}`);
			continue;
		}
		const result = entry.result;
		if (!result) {
			console.log(`${name} ${chalk.dim("skipped")}`);
			continue;
		}
		if (entry.subject === "none") {
			console.log(`${name} ${chalk.dim("no subject found")}`);
			continue;
		}
		const status = chalk.hex(STATUS_COLORS[result.status])(result.status);
		const best = entry.best
			? chalk.gray(` best: ${DISPLAY_NAMES[entry.best.type]} (${entry.best.score.toFixed(2)})`)
			: "";
		console.log(
			`${name} ${status} ${result.score.toFixed(2)} ${chalk.dim(entry.subject)} ${result.suggestion}${best}`,
		);
	}
}

async function main() {
	const argv = await yargs(hideBin(process.argv))
		.option("path", {
			type: "string",
			demandOption: true,
			describe: "Photo, or folder of photos, to analyze",
		})
		.option("rule", {
			type: "string",
			default: "rule_of_thirds",
			choices: [...COMPOSITION_TYPES],
			describe: "Composition rule to evaluate",
		})
		.option("best", {
			type: "boolean",
			default: false,
			describe: "Also score every rule and recommend the best one",
		})
		.option("subject", {
			type: "string",
			describe: "Use this normalized box (x,y,width,height) instead of detection",
		})
		.option("subject-kind", {
			type: "string",
			default: "human",
			choices: ["face", "human"],
			describe: "Kind reported for a --subject box",
		})
		.option("ext", {
			type: "string",
			default: DEFAULT_EXTS.join(","),
			describe: "Comma-separated extensions to include (lowercase)",
		})
		.option("out", {
			type: "string",
			default: "./composition.json",
			describe: "Where to write the JSON results",
		})
		.option("models", {
			type: "string",
			default: "models",
			describe: "Directory holding the face-api model weights",
		})
		.option("skip-facial-recognition", {
			type: "boolean",
			default: false,
			describe:
				"Skips loading the face detector. Photos are then only scored against --subject.",
		})
		.option("face-min-confidence", {
			type: "number",
			default: 0.3,
			describe: "Min confidence for face detection (0..1)",
		})
		.option("max-dim", {
			type: "number",
			default: 640,
			describe: "Max dimension photos are scaled to before analysis",
		})
		.option("center-tolerance", {
			type: "number",
			default: 0.12,
			describe: "Distance from center still counted as centered (0..1)",
		})
		.strict()
		.help()
		.parseAsync();

	const rule = String(argv.rule);
	if (!isCompositionType(rule)) {
		throw new Error(`Unknown rule: ${rule}`);
	}
	const subjectKind = argv["subject-kind"] === "face" ? "face" : "human";

	const config = resolveConfig({
		modelsDir: path.resolve(String(argv.models)),
		skipFacialRecognition: Boolean(argv["skip-facial-recognition"]),
		faceMinConfidence: Number(argv["face-min-confidence"]) || 0.3,
		analysisMaxDim: Number(argv["max-dim"]) || 640,
		center: { tolerance: Number(argv["center-tolerance"]) || 0.12 },
	});

	const target = path.resolve(String(argv.path));
	const stat = fs.statSync(target, { throwIfNoEntry: false });
	if (!stat) {
		throw new Error(`Path not found: ${target}`);
	}

	const exts = String(argv.ext)
		.split(",")
		.map((s) => s.trim().toLowerCase())
		.filter(Boolean);
	const files = stat.isDirectory() ? await getFilesInFolder(target, exts) : [target];
	if (!files.length) {
		console.log(`⚠️ No photos found in ${target}`);
		return;
	}

	const entries = await analyzeImages(files, {
		rule,
		recommend: Boolean(argv.best),
		subject: argv.subject ? parseSubjectBox(String(argv.subject)) : undefined,
		subjectKind,
		config,
	});

	printSummary(entries);
	saveLog(entries, path.resolve(String(argv.out)));
	console.log(chalk.gray(`📝 Results written to ${path.resolve(String(argv.out))}`));
}

await main().catch((err) => {
	console.error(err instanceof Error ? err.message : String(err));
	process.exitCode = 1;
});
