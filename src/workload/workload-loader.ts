import fs from "fs-extra";
import { parse as yamlParse } from "yaml";
import { CompilerError, ErrorCodes, errorMessage } from "../errors.ts";

/**
 * Reads a workload description from a YAML or JSON file.
 *
 * The result is unvalidated; pass it to the ManifestGenerator or
 * `parseWorkload`.
 */
export async function loadWorkloadFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new CompilerError(
      `Failed to read workload file ${filePath}: ${errorMessage(err)}`,
      ErrorCodes.WORKLOAD_FILE_UNREADABLE,
      { filePath },
      { cause: err },
    );
  }

  try {
    return yamlParse(content);
  } catch (err) {
    throw new CompilerError(
      `Failed to parse workload file ${filePath}: ${errorMessage(err)}`,
      ErrorCodes.WORKLOAD_FILE_UNREADABLE,
      { filePath },
      { cause: err },
    );
  }
}
