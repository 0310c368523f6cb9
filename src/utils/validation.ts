/**
 * Input validation: zod schemas and simulation file paths
 *
 * @module utils/validation
 */
import { isAbsolute, normalize, relative, resolve } from "path";
import { ZodError, type ZodType, type ZodTypeDef, type ZodIssue } from "zod";
import { ValidationError } from "../errors.js";

const PATH_SEPARATOR = /[\\/]/;

function pathIssue(message: string): unknown[] {
  return [{ code: "custom", path: ["filePath"], message }];
}

/**
 * Resolve the path of a simulation file.
 *
 * A `..` segment is rejected; dots inside a file name (`v1..2.json`) are not.
 * Relative paths resolve against `baseDir`, or the working directory.
 *
 * @param options.requireWithinBase - Also reject absolute paths outside `baseDir`
 * @returns Absolute, normalized path
 * @throws {ValidationError} On a `..` segment, or a path outside `baseDir` when required
 *
 * @example
 * ```typescript
 * validateFilePath("simulations/bookings.json", { baseDir: "/srv/tests" });
 * // "/srv/tests/simulations/bookings.json"
 * validateFilePath("../secrets.json"); // throws
 * ```
 */
export function validateFilePath(
  filePath: string,
  options: { baseDir?: string; requireWithinBase?: boolean } = {}
): string {
  const { baseDir, requireWithinBase = false } = options;

  if (filePath.split(PATH_SEPARATOR).includes("..")) {
    throw new ValidationError(
      `Simulation path must not contain ".." segments: "${filePath}"`,
      pathIssue('Path must not contain ".." segments')
    );
  }

  const resolvedPath = resolve(baseDir ?? process.cwd(), normalize(filePath));

  if (requireWithinBase && baseDir) {
    const relativePath = relative(resolve(baseDir), resolvedPath);
    if (relativePath.startsWith("..") || isAbsolute(relativePath)) {
      throw new ValidationError(
        `Simulation path "${filePath}" is outside "${baseDir}"`,
        pathIssue("Path must be within the base directory")
      );
    }
  }

  return resolvedPath;
}

/**
 * Validate data against a Zod schema, wrapping errors in ValidationError
 *
 * @param schema - Zod schema to validate against
 * @param data - Data to validate
 * @param context - Optional prefix for the error message (e.g., "simulation document")
 * @returns The validated and typed data (output type of the schema)
 * @throws {ValidationError} If validation fails
 *
 * @example
 * ```typescript
 * const config = validateOrThrow(HoverflyConfigSchema, input, "hoverfly config");
 * // Throws: ValidationError: hoverfly config: proxyPort: Number must be less than or equal to 65535
 * ```
 */
export function validateOrThrow<Output, Def extends ZodTypeDef, Input>(
  schema: ZodType<Output, Def, Input>,
  data: unknown,
  context?: string
): Output {
  try {
    return schema.parse(data);
  } catch (error) {
    if (error instanceof ZodError) {
      const message = context ? `${context}: ${formatZodError(error)}` : formatZodError(error);

      throw new ValidationError(message, error.errors);
    }
    throw error;
  }
}

/**
 * Format a ZodError into a human-readable message
 */
function formatZodError(error: ZodError): string {
  if (error.issues.length === 1) {
    return formatIssue(error.issues[0]);
  }

  return error.issues.map((issue, i) => `${i + 1}. ${formatIssue(issue)}`).join("; ");
}

function formatIssue(issue: ZodIssue): string {
  const path = issue.path.length > 0 ? `${issue.path.join(".")}: ` : "";
  return `${path}${issue.message}`;
}
