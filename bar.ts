// bar.ts

import chalk from "chalk";
import cliProgress from "cli-progress";
import type { CompositionStatus } from "./composition/types";

export type Outcome = CompositionStatus | "no-subject" | "failed";

export type Tally = Record<Outcome, number>;

const LABELS: ReadonlyArray<[Outcome, string]> = [
	["Perfect", "perfect"],
	["Good", "good"],
	["NeedsAdjustment", "to adjust"],
	["no-subject", "no subject"],
	["failed", "failed"],
];

/** One-line plain-text tally, zero counts left out */
export function formatTally(tally: Tally): string {
	return LABELS.filter(([key]) => tally[key] > 0)
		.map(([key, label]) => `${tally[key]} ${label}`)
		.join(" · ");
}

/**
 * Progress over a batch of photos, with a running count of outcomes next to
 * the bar and the photo currently being read.
 */
export class AnalysisBar {
	private readonly bar: cliProgress.SingleBar;
	private readonly tally: Tally = {
		Perfect: 0,
		Good: 0,
		NeedsAdjustment: 0,
		"no-subject": 0,
		failed: 0,
	};

	constructor(total: number, task = "Analyzing composition") {
		this.bar = new cliProgress.SingleBar(
			{
				format:
					`${chalk.cyan.bold("🎯 {task}")} ` +
					`|${chalk.magenta("{bar}")}| ${chalk.dim("{value}/{total}")} ` +
					`${chalk.gray("{tally}")} ${chalk.dim("{file}")}`,
				barCompleteChar: "█",
				barIncompleteChar: "░",
				hideCursor: true,
			},
			cliProgress.Presets.shades_classic,
		);
		this.bar.start(total, 0, { task, tally: "", file: "" });
	}

	/** Show the photo being analyzed */
	begin(file: string) {
		this.bar.update({ file });
	}

	record(outcome: Outcome) {
		this.tally[outcome]++;
		this.bar.increment(1, { tally: formatTally(this.tally) });
	}

	counts(): Tally {
		return { ...this.tally };
	}

	/** Stop the bar and print the final tally */
	finish(): Tally {
		this.bar.update({ file: "" });
		this.bar.stop();
		console.log(chalk.green.bold(`✅ Done! ${formatTally(this.tally)}`));
		return this.counts();
	}
}
