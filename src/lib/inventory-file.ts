import { readFile } from "node:fs/promises";
import type { InventorySource } from "../types.js";
import { InventoryError, ValidationError } from "./errors.js";
import { InventorySchema, parseWithSchema, type Inventory } from "./schemas.js";

/**
 * Reads an inventory snapshot from a JSON file instead of calling AWS.
 * Dates are ISO 8601 strings.
 *
 * @example
 * ```typescript
 * const source = new FileInventorySource("./snapshots/eu-west-1.json");
 * const inventory = await source.fetchInventory();
 * ```
 */
export class FileInventorySource implements InventorySource {
  constructor(private readonly path: string) {}

  async fetchInventory(): Promise<Inventory> {
    let content: string;
    try {
      content = await readFile(this.path, "utf8");
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new InventoryError("ReadInventoryFile", `Cannot read inventory file: ${reason}`, {
        details: { path: this.path },
        cause: error,
      });
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ValidationError(`Inventory file is not valid JSON: ${reason}`, {
        details: { path: this.path },
        cause: error,
      });
    }

    return parseWithSchema(InventorySchema, parsed, `inventory file ${this.path}`);
  }
}
