import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { main } from "../src/cli.js";

const fixturePath = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("cli", () => {
  let tmp: string;
  let stdout: string[];
  let stderr: string[];

  beforeEach(() => {
    tmp = fs.mkdtempSync(path.join(os.tmpdir(), "order-mapper-"));
    vi.stubEnv("ORDER_MAPPER_LOG_LEVEL", "silent");
    vi.stubEnv("ORDER_MAPPER_LOG_PRETTY", "false");
    vi.stubEnv("ORDER_MAPPER_PARTNER_PREFIX", "");
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, "write").mockImplementation((chunk: string | Uint8Array) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, "write").mockImplementation((chunk: string | Uint8Array) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    fs.rmSync(tmp, { recursive: true, force: true });
  });

  describe("convert", () => {
    it("creates the output directory and writes the order document", async () => {
      const out = path.join(tmp, "out", "orders");
      const code = await main([
        "convert",
        fixturePath("order.csv"),
        fixturePath("baseEDI.xml"),
        "--out",
        out,
      ]);

      const written = path.join(out, "WAITROSE_CUST-001.XML");
      expect(code).toBe(0);
      expect(fs.existsSync(written)).toBe(true);
      expect(fs.readFileSync(written, "utf-8")).toContain("<CustOrder>CUST-001</CustOrder>");
      expect(stdout.join("").split("\n").slice(0, 3)).toEqual([
        `Output file: ${written}`,
        "Header fields: 15",
        "Line items: 2",
      ]);
    });

    it("names the file with the configured partner prefix", async () => {
      vi.stubEnv("ORDER_MAPPER_PARTNER_PREFIX", "OCADO");
      const code = await main(["convert", fixturePath("order.csv"), fixturePath("baseEDI.xml"), "-o", tmp]);

      expect(code).toBe(0);
      expect(fs.readdirSync(tmp)).toEqual(["OCADO_CUST-001.XML"]);
    });

    it("exits with 1 and writes nothing when the conversion fails", async () => {
      const csv = path.join(tmp, "broken.csv");
      fs.writeFileSync(csv, "###ORD-HEADER\nCUST-ORDER\nX\n");
      const out = path.join(tmp, "out");

      const code = await main(["convert", csv, fixturePath("baseEDI.xml"), "--out", out]);

      expect(code).toBe(1);
      expect(fs.existsSync(out)).toBe(false);
      expect(stdout).toEqual([]);
      expect(stderr.join("")).toMatch(/^Conversion failed \[MALFORMED_INPUT\]: Missing sentinel row /);
    });

    it("logs to stderr so stdout carries only the summary", async () => {
      vi.stubEnv("ORDER_MAPPER_LOG_LEVEL", "info");
      const code = await main(["convert", fixturePath("order.csv"), fixturePath("baseEDI.xml"), "-o", tmp]);

      expect(code).toBe(0);
      expect(stdout.join("")).not.toContain("order converted");
      expect(stderr.join("")).toContain('"msg":"order converted"');
    });
  });

  describe("validate", () => {
    it("reports a well-formed CSV", async () => {
      const csv = fixturePath("order.csv");
      expect(await main(["validate", csv])).toBe(0);
      expect(stdout).toEqual([`${csv}: CSV file format is valid\n`]);
    });

    it("exits with 1 and prints usage without a CSV path", async () => {
      expect(await main(["validate"])).toBe(1);
      expect(stderr.join("")).toMatch(/^Usage:\n/);
    });
  });

  it("exits with 1 on an unknown command", async () => {
    expect(await main(["publish"])).toBe(1);
    expect(stdout).toEqual([]);
  });
});
