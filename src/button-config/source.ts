/**
 * Button Config Module - Config Sources
 *
 * A source returns every row of the button table in sheet order.
 */
import { type Result, err, ok } from "neverthrow";

import {
  formatSheetsError,
  quoteTabName,
  type SheetsClient,
} from "../sheets/index.js";
import type { ConfigSourceError } from "./errors.js";
import type { RawConfigRow } from "./schema.js";
import { gridToRows } from "./transform.js";

export type ConfigSource = Readonly<{
  fetchAll: () => Promise<Result<ReadonlyArray<RawConfigRow>, ConfigSourceError>>;
}>;

/**
 * Reads the whole config tab in one request (header row + rows).
 */
export function createSheetsConfigSource(
  client: SheetsClient,
  tab: string,
): ConfigSource {
  return {
    fetchAll: async () => {
      const result = await client.getValues(quoteTabName(tab));
      if (result.isErr()) {
        return err({ message: formatSheetsError(result.error) });
      }
      return ok(gridToRows(result.value));
    },
  };
}
