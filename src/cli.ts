#!/usr/bin/env node
import { realpathSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { parseArgs } from "node:util";
import { loadConfig, type AppConfig } from "./config.js";
import { createOrderConverter } from "./index.js";
import { validateOrderCsv } from "./core/validateOrderCsv.js";
import { createLogger, type Logger } from "./utils/logger.js";

const USAGE = `Usage:
  order-mapper convert [csv_file] [base_xml_file] [--out <dir>]
  order-mapper validate <csv_file>`;

const DEFAULT_CSV = "inputs/order.csv";

async function convertCommand(
  args: string[],
  out: string | undefined,
  config: AppConfig,
  logger: Logger,
): Promise<number> {
  const [csvPath = DEFAULT_CSV, templatePath = config.templatePath] = args;
  const outputDir = out ?? config.outputDir;

  const [csvText, template] = await Promise.all([
    fs.readFile(csvPath, "utf-8"),
    fs.readFile(templatePath, "utf-8"),
  ]);

  const converter = createOrderConverter({
    template,
    logger,
    partnerPrefix: config.partnerPrefix,
  });
  const res = converter.convert(csvText);
  if (!res.ok) {
    process.stderr.write(`Conversion failed [${res.error.code}]: ${res.error.message}\n`);
    return 1;
  }

  await fs.mkdir(outputDir, { recursive: true });
  const outputPath = path.join(outputDir, res.value.fileName);
  await fs.writeFile(outputPath, res.value.xml, "utf-8");

  const filled = Object.entries(res.value.header).filter(([, v]) => v !== "");
  process.stdout.write(
    [
      `Output file: ${outputPath}`,
      `Header fields: ${filled.length}`,
      `Line items: ${res.value.lineItems.length}`,
      ...filled.map(([k, v]) => `  ${k}: ${v}`),
      "",
    ].join("\n"),
  );
  return 0;
}

async function validateCommand(args: string[]): Promise<number> {
  const [csvPath] = args;
  if (!csvPath) {
    process.stderr.write(`${USAGE}\n`);
    return 1;
  }

  const result = validateOrderCsv(await fs.readFile(csvPath, "utf-8"));
  if (result.valid) {
    process.stdout.write(`${csvPath}: CSV file format is valid\n`);
    return 0;
  }
  process.stdout.write(
    [
      `${csvPath}: CSV file format is invalid`,
      ...result.errors.map((e, i) => `  ${i + 1}. ${e}`),
      "",
    ].join("\n"),
  );
  return 1;
}

export async function main(argv: string[]): Promise<number> {
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    options: { out: { type: "string", short: "o" } },
  });
  const [command, ...rest] = positionals;

  const config = loadConfig();
  const logger = createLogger(config.logLevel, config.logPretty, "stderr");

  switch (command) {
    case "convert":
      return convertCommand(rest, values.out, config, logger);
    case "validate":
      return validateCommand(rest);
    default:
      process.stderr.write(`${USAGE}\n`);
      return 1;
  }
}

const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(realpathSync(entry)).href) {
  main(process.argv.slice(2)).then(
    (code) => {
      process.exitCode = code;
    },
    (e: unknown) => {
      process.stderr.write(`${e instanceof Error ? e.message : String(e)}\n`);
      process.exitCode = 1;
    },
  );
}
