import { z } from 'zod';

export const RELEASE_FLAG = '--release';

export const CargoCiConfigSchema = z.object({
  /** Build profile selector, passed to `cargo build` and `cargo test`. */
  profile: z.string().default(''),
  /** Profile value that enables the benchmark step. */
  releaseFlag: z.string().min(1).default(RELEASE_FLAG),
  cargo: z.string().min(1).default('cargo'),
  /** Keep the run green when `cargo test` fails. */
  allowTestFailures: z.boolean().default(true),
  /** Echo each command to stderr before it runs. */
  trace: z.boolean().default(true),
  workingDir: z.string().optional(),
});

export type CargoCiConfig = z.infer<typeof CargoCiConfigSchema>;

export type ConfigOverrides = Partial<CargoCiConfig>;
