#!/usr/bin/env tsx
/**
 * CLI: iqc:evaluate
 *
 * Usage: npm run iqc:evaluate -- --dataset <dir> [--sd-mode empirical|cvh] [--sigma <n>] [--out <dir>]
 *
 * Evaluates a dataset directory (iqc.config.json + measurements.csv) against
 * the sigma-selected Westgard rules and writes evaluation.json.
 * IQC_SD_MODE, IQC_SIGMA and IQC_MAX_RUNS apply when the flags are absent.
 */

import { mkdirSync, writeFileSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { v4 as uuidv4 } from "uuid";

import { loadDataset } from "../packs/loader.js";
import { buildEvaluationReport } from "../packs/report.js";
import { evaluateIqc } from "../analytics/evaluation.js";
import { parseMaxRuns, parseSdMode, parseSigmaOverride } from "../shared/run_config.js";
import type { RunConfig } from "../shared/run_config.js";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const ROOT = path.resolve(__dirname, "..", "..");

interface CliArgs {
  dataset?: string;
  sdMode?: string;
  sigma?: string;
  out?: string;
  maxRuns?: string;
}

function parseArgs(args: string[]): CliArgs {
  const parsed: CliArgs = {};
  for (let i = 0; i < args.length; i++) {
    const next = args[i + 1];
    if (next === undefined) break;
    switch (args[i]) {
      case "--dataset":
        parsed.dataset = next;
        break;
      case "--sd-mode":
        parsed.sdMode = next;
        break;
      case "--sigma":
        parsed.sigma = next;
        break;
      case "--out":
        parsed.out = next;
        break;
      case "--max-runs":
        parsed.maxRuns = next;
        break;
      default:
        continue;
    }
    i++;
  }
  return parsed;
}

function main() {
  const args = parseArgs(process.argv.slice(2));

  if (!args.dataset) {
    console.error(
      "Usage: npm run iqc:evaluate -- --dataset <dir> [--sd-mode empirical|cvh] [--sigma <n>] [--out <dir>]"
    );
    process.exit(1);
  }

  const datasetDir = path.resolve(args.dataset);

  console.log("╔══════════════════════════════════════════════════════════════╗");
  console.log("║  IQC Westgard Sigma Rule Evaluation                          ║");
  console.log("╚══════════════════════════════════════════════════════════════╝");
  console.log();
  console.log(`  Dataset:   ${datasetDir}`);

  try {
    const dataset = loadDataset(datasetDir);
    const { config } = dataset;

    const runConfig: RunConfig = {
      sigma: parseSigmaOverride(args.sigma, process.env.IQC_SIGMA) ?? config.sigma,
      levelCount: config.levelCount,
      sdMode:
        args.sdMode || process.env.IQC_SD_MODE
          ? parseSdMode(args.sdMode, process.env.IQC_SD_MODE)
          : config.sdMode,
      maxRuns: parseMaxRuns(args.maxRuns, process.env.IQC_MAX_RUNS),
    };

    const evaluation = evaluateIqc({
      sigma: runConfig.sigma,
      levelCount: runConfig.levelCount,
      sdMode: runConfig.sdMode,
      reference: config.reference,
      measurements: dataset.measurements,
      maxRuns: runConfig.maxRuns,
    });

    console.log(`  Analyte:   ${config.analyte.testName}${config.analyte.unit ? ` (${config.analyte.unit})` : ""}`);
    console.log(`  Levels:    ${runConfig.levelCount}`);
    console.log(`  SD mode:   ${runConfig.sdMode}`);
    console.log(`  Runs:      ${dataset.measurements.length}`);
    console.log(`  ${evaluation.ruleSetDescription}`);
    console.log();

    for (const ref of evaluation.referenceUsed) {
      const mean = ref.mean === null ? "n/a" : ref.mean.toPrecision(4);
      const sd = ref.sd === null ? "n/a" : ref.sd.toPrecision(4);
      console.log(`    Ctrl ${ref.level}: mean=${mean} sd=${sd}`);
    }
    console.log();

    console.log("  Run verdicts:");
    for (const v of evaluation.runVerdicts) {
      const icon = v.status === "Reject" ? "✗" : v.status === "Warning" ? "⚠" : "✓";
      const detail = v.summary ? `  ${v.summary}` : "";
      console.log(`    ${icon} ${v.label.padEnd(8)} ${v.status.padEnd(8)}${detail}`);
    }

    if (dataset.warnings.length > 0) {
      console.log();
      console.log("  Warnings:");
      for (const w of dataset.warnings) {
        console.log(`    ⚠ ${w}`);
      }
    }

    const outDir = args.out
      ? path.resolve(args.out)
      : path.join(ROOT, "out", path.basename(datasetDir));
    mkdirSync(outDir, { recursive: true });

    const report = buildEvaluationReport({
      reportId: uuidv4(),
      generatedAt: new Date().toISOString(),
      analyte: config.analyte,
      sdMode: runConfig.sdMode,
      sigma: runConfig.sigma ?? null,
      evaluation,
      warnings: dataset.warnings,
    });
    const reportPath = path.join(outDir, "evaluation.json");
    writeFileSync(reportPath, JSON.stringify(report, null, 2));

    const rejected = evaluation.runVerdicts.filter((v) => v.status === "Reject").length;
    const warned = evaluation.runVerdicts.filter((v) => v.status === "Warning").length;
    console.log();
    console.log(`  Rejected:    ${rejected}`);
    console.log(`  Warnings:    ${warned}`);
    console.log(`  Fingerprint: ${evaluation.inputFingerprint.slice(0, 16)}...`);
    console.log(`  Report:      ${reportPath}`);
    console.log();
    console.log("  ✓ Evaluation complete.");
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`\n  ✗ Evaluation failed: ${message}`);
    process.exit(1);
  }
}

main();
