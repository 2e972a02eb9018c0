import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

dotenv.config({
  path: path.resolve(process.cwd(), ".env")
});

const envSchema = z
  .object({
    NODE_ENV: z.enum(["development", "test", "production"]).default("development"),
    PORT: z.coerce.number().default(4000),
    /** Number of highest-scoring questions counted per attempt. */
    GRADER_BEST_N: z.coerce.number().int().positive().default(10),
    GRADER_SCALED_MIN: z.coerce.number().default(10),
    GRADER_SCALED_MAX: z.coerce.number().default(20),
    EXECUTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    ASSERTION_TIMEOUT_MS: z.coerce.number().int().positive().default(5_000),
    GRADER_CONTEXT_SCOPE: z.enum(["question", "shared"]).default("question"),
    LOG_LEVEL: z.enum(["silent", "minimal", "normal", "verbose"]).default("normal"),
    /** Comma-separated origins allowed to call the API from a browser. */
    CORS_ORIGINS: z.string().optional(),
    /** Request body limit for uploaded notebooks, in express.json() syntax. */
    JSON_BODY_LIMIT: z.string().default("10mb")
  })
  .refine((e) => e.GRADER_SCALED_MIN <= e.GRADER_SCALED_MAX, {
    message: "GRADER_SCALED_MIN must not exceed GRADER_SCALED_MAX",
    path: ["GRADER_SCALED_MIN"]
  });

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const issueText = parsed.error.issues
    .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
    .join("; ");
  throw new Error(`Invalid environment variables: ${issueText}`);
}

export const env = parsed.data;
