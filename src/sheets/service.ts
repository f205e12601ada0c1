/**
 * Sheets Module - Service Layer
 *
 * HTTP calls to the Google Sheets values API.
 * Every call is bounded by the configured timeout; a hang becomes a TIMEOUT error.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger } from "../logger.js";
import type { SheetsError } from "./errors.js";
import {
  invalidResponse,
  networkError,
  requestFailed,
  timeout,
} from "./errors.js";
import type { AppendResult, CellValue, SheetsConfig } from "./schema.js";
import { AppendResponseSchema, ValueRangeResponseSchema } from "./schema.js";
import {
  buildAppendUrl,
  buildValuesUrl,
  normalizeGrid,
  tabRange,
} from "./transform.js";

const log = createLogger("sheets");

/**
 * The spreadsheet capability used by the config source and the log sink.
 */
export type SheetsClient = Readonly<{
  getValues: (range: string) => Promise<Result<string[][], SheetsError>>;
  appendRow: (
    tab: string,
    cells: ReadonlyArray<CellValue>,
  ) => Promise<Result<AppendResult, SheetsError>>;
}>;

async function requestJson(
  config: SheetsConfig,
  url: string,
  init: RequestInit,
): Promise<Result<unknown, SheetsError>> {
  try {
    const response = await fetch(url, {
      ...init,
      headers: {
        Accept: "application/json",
        "Content-Type": "application/json",
        Authorization: `Bearer ${config.accessToken}`,
      },
      signal: AbortSignal.timeout(config.timeoutMs),
    });

    if (!response.ok) {
      const errorText = await response.text().catch(() => "Unknown error");
      return err(requestFailed(errorText, response.status));
    }

    return ok(await response.json());
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));

    if (cause.name === "TimeoutError" || cause.name === "AbortError") {
      return err(timeout(`No response within ${config.timeoutMs}ms`));
    }

    return err(networkError("Failed to reach Sheets API", cause));
  }
}

/**
 * Create a Sheets client bound to one spreadsheet.
 */
export function createSheetsClient(config: SheetsConfig): SheetsClient {
  const getValues = async (
    range: string,
  ): Promise<Result<string[][], SheetsError>> => {
    log.debug({ range }, "Reading range...");

    const result = await requestJson(config, buildValuesUrl(config, range), {
      method: "GET",
    });
    if (result.isErr()) return err(result.error);

    const parsed = ValueRangeResponseSchema.safeParse(result.value);
    if (!parsed.success) {
      return err(invalidResponse("Unexpected values.get payload"));
    }

    const rows = normalizeGrid(parsed.data.values);
    log.debug({ range, rows: rows.length }, "Range read");
    return ok(rows);
  };

  const appendRow = async (
    tab: string,
    cells: ReadonlyArray<CellValue>,
  ): Promise<Result<AppendResult, SheetsError>> => {
    const range = tabRange(tab, cells.length);
    log.debug({ range, cells: cells.length }, "Appending row...");

    const result = await requestJson(config, buildAppendUrl(config, range), {
      method: "POST",
      body: JSON.stringify({ values: [cells] }),
    });
    if (result.isErr()) return err(result.error);

    const parsed = AppendResponseSchema.safeParse(result.value);
    if (!parsed.success) {
      return err(invalidResponse("Unexpected values.append payload"));
    }

    const appended: AppendResult = {
      updatedRange: parsed.data.updates?.updatedRange ?? null,
      updatedRows: parsed.data.updates?.updatedRows ?? 0,
    };
    log.info({ tab, updatedRange: appended.updatedRange }, "Row appended");
    return ok(appended);
  };

  return { getValues, appendRow };
}
