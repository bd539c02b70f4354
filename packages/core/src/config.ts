import { z } from "zod";
import { ConfigError } from "tessera-shared";

export const DirtyTrackingSchema = z.enum(["subtree", "root"]);

const optionFields = {
  /** Root name, logged with every line of the root */
  name: z.string().min(1),
  /**
   * "subtree" re-evaluates the lowest common ancestor of the dirty
   * identities; "root" re-evaluates the whole tree on every change.
   */
  dirtyTracking: DirtyTrackingSchema,
  /** Evaluate twice per tick and warn when the results differ */
  strict: z.boolean(),
};

export const RootOptionsSchema = z
  .object({
    name: optionFields.name.default("root"),
    dirtyTracking: optionFields.dirtyTracking.default("subtree"),
    strict: optionFields.strict.default(false),
  })
  .strict();

const PartialRootOptionsSchema = z.object(optionFields).partial().strict();

export type DirtyTracking = z.infer<typeof DirtyTrackingSchema>;
export type RootOptions = z.output<typeof RootOptionsSchema>;
export type RootOptionsInput = z.input<typeof RootOptionsSchema>;

let defaults: RootOptionsInput = {};

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`);
}

/**
 * Set process-wide defaults merged under each root's explicit options.
 *
 * @example
 * ```typescript
 * configureDefaults({ strict: process.env.NODE_ENV !== "production" });
 * ```
 */
export function configureDefaults(options: RootOptionsInput): void {
  const parsed = PartialRootOptionsSchema.safeParse(options);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`invalid default root options: ${issues.join("; ")}`, issues);
  }
  defaults = { ...defaults, ...parsed.data };
}

export function getDefaults(): RootOptionsInput {
  return { ...defaults };
}

/**
 * Reset defaults (mainly for testing).
 */
export function resetDefaults(): void {
  defaults = {};
}

/**
 * Validate root options, filling gaps from the defaults.
 *
 * @throws ConfigError listing every failing field
 */
export function resolveRootOptions(options: RootOptionsInput = {}): RootOptions {
  const parsed = RootOptionsSchema.safeParse({ ...defaults, ...options });
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`invalid root options: ${issues.join("; ")}`, issues);
  }
  return parsed.data;
}
