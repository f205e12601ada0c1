/**
 * Button Config Module - Service Layer
 *
 * Caches the whole button table with a TTL. Readers always hold a complete
 * table reference; a refresh swaps the reference, never mutates in place.
 * Concurrent misses share a single in-flight fetch.
 */
import { type Result, err, ok } from "neverthrow";

import { createLogger, logOperationComplete, logOperationStart } from "../logger.js";
import type { ConfigError } from "./errors.js";
import { configNotFound, sourceUnavailable } from "./errors.js";
import type { ButtonConfig, ConfigCacheStatus, ConfigTable } from "./schema.js";
import type { ConfigSource } from "./source.js";
import {
  buildConfigTable,
  describeCache,
  isTableFresh,
  lookupButton,
} from "./transform.js";

const log = createLogger("button-config");

export type ConfigResolver = Readonly<{
  resolve: (
    deviceId: string,
    buttonIndex: number,
  ) => Promise<Result<ButtonConfig, ConfigError>>;
  /** Force the next resolve to refetch */
  invalidate: () => void;
  /** Fetch now, regardless of TTL */
  refresh: () => Promise<Result<ConfigCacheStatus, ConfigError>>;
  status: () => ConfigCacheStatus;
}>;

export type ConfigResolverOptions = Readonly<{
  source: ConfigSource;
  ttlMs: number;
  now?: () => number;
}>;

/** Source failure text when the table is a stale fallback */
type FetchedTable = Readonly<{ table: ConfigTable; sourceError: string | null }>;

export function createConfigResolver(
  options: ConfigResolverOptions,
): ConfigResolver {
  const { source, ttlMs } = options;
  const now = options.now ?? Date.now;

  let table: ConfigTable | null = null;
  let expiresAt = 0;
  let inFlight: Promise<Result<FetchedTable, ConfigError>> | null = null;

  const fetchTable = async (): Promise<Result<FetchedTable, ConfigError>> => {
    const startTime = Date.now();
    logOperationStart(log, "fetchButtonTable");
    const result = await source.fetchAll();

    if (result.isErr()) {
      if (table) {
        log.warn(
          {
            error: result.error.message,
            fetchedAt: new Date(table.fetchedAt).toISOString(),
          },
          "Config source unreachable - serving stale button table",
        );
        return ok({ table, sourceError: result.error.message });
      }

      log.error({ error: result.error.message }, "Config source unreachable");
      return err(sourceUnavailable(result.error.message));
    }

    const next = buildConfigTable(result.value, now());
    for (const rejected of next.rejected) {
      log.warn(
        { rowNumber: rejected.rowNumber, reason: rejected.reason },
        "Config row rejected",
      );
    }

    table = next;
    expiresAt = next.fetchedAt + ttlMs;
    logOperationComplete(log, "fetchButtonTable", startTime, {
      buttons: next.buttons.size,
      rejected: next.rejected.length,
    });
    return ok({ table: next, sourceError: null });
  };

  const fetchShared = (): Promise<Result<FetchedTable, ConfigError>> => {
    if (!inFlight) {
      inFlight = fetchTable().finally(() => {
        inFlight = null;
      });
    }
    return inFlight;
  };

  const currentTable = (): Promise<Result<ConfigTable, ConfigError>> => {
    if (table && isTableFresh(expiresAt, now())) {
      return Promise.resolve(ok(table));
    }
    return fetchShared().then((result) => result.map((fetched) => fetched.table));
  };

  const resolve = async (
    deviceId: string,
    buttonIndex: number,
  ): Promise<Result<ButtonConfig, ConfigError>> => {
    const tableResult = await currentTable();
    if (tableResult.isErr()) return err(tableResult.error);

    const button = lookupButton(tableResult.value, deviceId, buttonIndex);
    if (!button) {
      log.warn({ deviceId, buttonIndex }, "No config row for button");
      return err(configNotFound(deviceId, buttonIndex));
    }

    return ok(button);
  };

  const invalidate = (): void => {
    expiresAt = 0;
    log.info("Button table invalidated");
  };

  const status = (): ConfigCacheStatus => describeCache(table, expiresAt, now());

  // A stale table keeps serving resolves, but a refresh that could not reach
  // the source is reported as failed.
  const refresh = async (): Promise<Result<ConfigCacheStatus, ConfigError>> => {
    invalidate();
    const result = await fetchShared();
    if (result.isErr()) return err(result.error);
    if (result.value.sourceError !== null) {
      return err(sourceUnavailable(result.value.sourceError));
    }
    return ok(status());
  };

  return { resolve, invalidate, refresh, status };
}
