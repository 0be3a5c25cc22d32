/**
 * @shortlane/shared - Shared Package Exports
 *
 * Short code generation, code and destination validation, and the
 * constants both depend on. Import from the package root only:
 *
 * ```ts
 * import { RandomCodeGenerator, validateCode } from "@shortlane/shared";
 * ```
 */

export * from "./types/index.js";

export * from "./utils/index.js";

export * from "./constants/index.js";
