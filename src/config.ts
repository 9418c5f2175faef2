import { z } from "zod";
import { DEFAULT_PARTNER_PREFIX } from "./output/filename.js";

const AppConfigSchema = z.object({
  logLevel: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]),
  logPretty: z.boolean(),
  templatePath: z.string().min(1),
  outputDir: z.string().min(1),
  partnerPrefix: z
    .string()
    .min(1)
    .regex(/^[A-Za-z0-9_-]+$/, "must contain only letters, digits, '_' or '-'"),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const result = AppConfigSchema.safeParse({
    logLevel: env.ORDER_MAPPER_LOG_LEVEL || "info",
    logPretty: env.ORDER_MAPPER_LOG_PRETTY === "true",
    templatePath: env.ORDER_MAPPER_TEMPLATE || "inputs/baseEDI.XML",
    outputDir: env.ORDER_MAPPER_OUTPUT_DIR || "outputs",
    partnerPrefix: env.ORDER_MAPPER_PARTNER_PREFIX || DEFAULT_PARTNER_PREFIX,
  });

  if (!result.success) {
    const msgs = result.error.issues
      .map((i) => `${i.path.join(".")} ${i.message}`)
      .join("; ");
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  return result.data;
}
