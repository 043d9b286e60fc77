/**
 * Dataset Loader: reads an IQC dataset directory.
 *
 * Layout:
 *   <dir>/iqc.config.json   analyte info, level count, sigma, SD mode, reference stats
 *   <dir>/measurements.csv  "run" column plus "Ctrl 1" … "Ctrl n"
 */

import { readFileSync, existsSync } from "fs";
import path from "path";
import { parse } from "csv-parse/sync";
import type { ZodError } from "zod";

import { CsvRowsSchema, DatasetConfigSchema, RUN_COLUMN, levelColumn } from "./types.js";
import type { DatasetConfig } from "./types.js";
import type { LevelCount, MeasurementRow } from "../shared/types.js";

export const CONFIG_FILENAME = "iqc.config.json";
export const MEASUREMENTS_FILENAME = "measurements.csv";

export interface IqcDataset {
  config: DatasetConfig;
  measurements: MeasurementRow[];
  warnings: string[];
}

function formatZodError(err: ZodError): string {
  return err.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

/**
 * Load and validate the dataset config.
 */
export function loadDatasetConfig(datasetDir: string): DatasetConfig {
  const configPath = path.join(datasetDir, CONFIG_FILENAME);
  if (!existsSync(configPath)) {
    throw new Error(`Dataset config not found: ${configPath}`);
  }
  const raw: unknown = JSON.parse(readFileSync(configPath, "utf-8"));
  const result = DatasetConfigSchema.safeParse(raw);
  if (!result.success) {
    throw new Error(`Invalid dataset config ${configPath}: ${formatZodError(result.error)}`);
  }
  return result.data;
}

/**
 * Parse measurement CSV text into rows with one value per level.
 * Blank run labels fall back to the 1-based row number.
 */
export function parseMeasurementsCsv(
  text: string,
  levelCount: LevelCount
): { measurements: MeasurementRow[]; warnings: string[] } {
  const records = CsvRowsSchema.parse(
    parse(text, {
      columns: true,
      skip_empty_lines: true,
      trim: true,
      relax_column_count: true,
    })
  );

  const warnings: string[] = [];
  const headers = records.length > 0 ? Object.keys(records[0]) : [];

  if (records.length > 0) {
    for (let level = 1; level <= levelCount; level++) {
      if (!headers.includes(levelColumn(level))) {
        warnings.push(`Column "${levelColumn(level)}" not found; treated as empty`);
      }
    }
    const extra = headers.filter((h) => /^Ctrl \d+$/.test(h) && Number(h.slice(5)) > levelCount);
    for (const h of extra) {
      warnings.push(`Column "${h}" ignored (level count is ${levelCount})`);
    }
  }

  const measurements = records.map((record, i) => {
    const label = record[RUN_COLUMN]?.trim();
    const values: string[] = [];
    for (let level = 1; level <= levelCount; level++) {
      values.push(record[levelColumn(level)] ?? "");
    }
    return { label: label ? label : String(i + 1), values };
  });

  return { measurements, warnings };
}

export function loadDataset(datasetDir: string): IqcDataset {
  const config = loadDatasetConfig(datasetDir);

  const csvPath = path.join(datasetDir, MEASUREMENTS_FILENAME);
  if (!existsSync(csvPath)) {
    throw new Error(`Measurements file not found: ${csvPath}`);
  }
  const { measurements, warnings } = parseMeasurementsCsv(
    readFileSync(csvPath, "utf-8"),
    config.levelCount
  );

  return { config, measurements, warnings };
}
