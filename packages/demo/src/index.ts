#!/usr/bin/env node
/**
 * @proofpass/demo — Interactive CLI walkthrough.
 *
 * Runs one event's lifecycle in your terminal on a fresh in-process
 * deployment (no HTTP server).
 */

import chalk from "chalk";
import { SCENARIO_STEPS, runScenario } from "./scenario.js";
import type { Reporter } from "./scenario.js";

const DELAY_MS = 400;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                     PROOFPASS DEMO                       ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Attendance tokens, collectibles, attestations     ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function short(value: string): string {
  return value.length > 24 ? `${value.slice(0, 12)}...${value.slice(-8)}` : value;
}

function terminalReporter(): Reporter {
  let step = 0;
  return {
    step(title) {
      step++;
      const prefix = chalk.cyan.bold(`  Step ${String(step)}/${String(SCENARIO_STEPS.length)}`);
      const line = chalk.gray("─".repeat(Math.max(4, 50 - title.length)));
      console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
    },
    ok(message) {
      console.log(chalk.green("    ✓ ") + chalk.white(message));
    },
    info(label, value) {
      const shown = value.startsWith("0x") ? chalk.yellow(short(value)) : chalk.white(value);
      console.log(chalk.gray("    → ") + chalk.gray(label.padEnd(14)) + shown);
    },
    blocked(message) {
      console.log(chalk.yellow("    ✗ ") + chalk.yellow(message));
    },
  };
}

async function run(): Promise<void> {
  banner();
  const variant = process.argv.includes("--companion") ? "companion" : "burn";

  await sleep(DELAY_MS);
  const summary = await runScenario(terminalReporter(), { variant });

  console.log();
  console.log(chalk.white("    Events recorded:     ") + chalk.cyan.bold(String(summary.eventCount)));
  console.log(chalk.white("    Attestations:        ") + chalk.cyan.bold(String(summary.aliceAttestations)));
  console.log(chalk.white("    Rejected actions:    ") + chalk.cyan.bold(summary.blocked.join(", ")));
  console.log(
    chalk.white("    Integrity:           ") +
      (summary.chainValid && summary.balanced ? chalk.green.bold("VALID") : chalk.red.bold("BROKEN")),
  );
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
