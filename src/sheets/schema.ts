/**
 * Sheets Module - Schemas and Types
 *
 * Shapes of the Google Sheets REST (v4) values API used for the
 * button table and the press log.
 */
import { z } from "zod";

/**
 * Connection settings for a single spreadsheet.
 */
export type SheetsConfig = Readonly<{
  apiUrl: string;
  spreadsheetId: string;
  accessToken: string;
  timeoutMs: number;
}>;

/**
 * values.get response. `values` is omitted entirely for an empty range.
 */
export const ValueRangeResponseSchema = z.object({
  range: z.string().optional(),
  majorDimension: z.string().optional(),
  values: z.array(z.array(z.union([z.string(), z.number(), z.boolean()]))).optional(),
});

export type ValueRangeResponse = z.infer<typeof ValueRangeResponseSchema>;

/**
 * values.append response (only the fields we read).
 */
export const AppendResponseSchema = z.object({
  spreadsheetId: z.string().optional(),
  tableRange: z.string().optional(),
  updates: z
    .object({
      updatedRange: z.string().optional(),
      updatedRows: z.number().optional(),
      updatedCells: z.number().optional(),
    })
    .optional(),
});

export type AppendResponse = z.infer<typeof AppendResponseSchema>;

/**
 * A cell as written by the pipeline.
 */
export type CellValue = string | number | boolean;

/**
 * Result of a successful append.
 */
export type AppendResult = Readonly<{
  updatedRange: string | null;
  updatedRows: number;
}>;
