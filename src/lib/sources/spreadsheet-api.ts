/**
 * Spreadsheet source backed by the Google Sheets API
 *
 * Each sheet's first row is the header. Authentication uses a service
 * account key file with read-only scope.
 */

import { google } from "googleapis";
import { Dataset, LoadedSource } from "../../types/data-model.js";
import { SpreadsheetSourceConfig } from "../../types/config.js";
import { RecordShiftError, SourceReadError } from "../../utils/errors.js";
import { logger } from "../../utils/logger.js";
import { datasetFromRows } from "../dataset/index.js";
import { assertFileExists } from "./file-utils.js";
import { SourceAdapter } from "./types.js";

export const SHEETS_READONLY_SCOPE = "https://www.googleapis.com/auth/spreadsheets.readonly";

/**
 * Returns the raw cell grid of one sheet range
 */
export type SheetValuesFetcher = (spreadsheetId: string, range: string) => Promise<unknown[][]>;

export type SheetValuesFetcherFactory = (credentialsFile: string) => SheetValuesFetcher;

export const createSheetsFetcher: SheetValuesFetcherFactory = (credentialsFile) => {
  const auth = new google.auth.GoogleAuth({
    keyFile: credentialsFile,
    scopes: [SHEETS_READONLY_SCOPE],
  });
  const sheets = google.sheets({ version: "v4", auth });

  return async (spreadsheetId, range) => {
    const response = await sheets.spreadsheets.values.get({ spreadsheetId, range });
    return response.data.values ?? [];
  };
};

function cellText(cell: unknown): string {
  if (cell === undefined || cell === null) {
    return "";
  }
  return typeof cell === "string" ? cell : String(cell);
}

/**
 * Header row + data rows → text dataset. Undefined for a sheet with no header.
 */
export function sheetToDataset(values: readonly (readonly unknown[])[]): Dataset | undefined {
  const [header, ...rows] = values;
  if (!header || header.length === 0) {
    return undefined;
  }
  return datasetFromRows(
    header.map(cellText),
    rows.map((row) => row.map(cellText)),
  );
}

export class SpreadsheetApiSource implements SourceAdapter {
  readonly kind = "spreadsheet";

  constructor(
    private readonly config: SpreadsheetSourceConfig,
    private readonly fetcherFactory: SheetValuesFetcherFactory = createSheetsFetcher,
  ) {}

  get name(): string {
    return this.config.name;
  }

  inputFiles(): string[] {
    return [];
  }

  async load(): Promise<LoadedSource> {
    await assertFileExists(this.config.credentialsFile);
    const fetchValues = this.fetcherFactory(this.config.credentialsFile);

    const users = sheetToDataset(await this.fetchSheet(fetchValues, this.config.usersSheet));
    if (!users) {
      throw new SourceReadError(`Sheet ${this.config.usersSheet} is empty`, {
        spreadsheetId: this.config.spreadsheetId,
        sheet: this.config.usersSheet,
      });
    }

    let dependants: Dataset | undefined;
    if (this.config.dependantsSheet !== null) {
      dependants = sheetToDataset(await this.fetchSheet(fetchValues, this.config.dependantsSheet));
      if (!dependants) {
        logger.warn("Dependants sheet is empty, continuing without dependants", {
          source: this.name,
          sheet: this.config.dependantsSheet,
        });
      }
    }

    logger.info("Spreadsheet source loaded", {
      source: this.name,
      users: users.rowCount,
      dependants: dependants?.rowCount ?? 0,
    });

    return dependants ? { users, dependants } : { users };
  }

  private async fetchSheet(fetchValues: SheetValuesFetcher, sheet: string): Promise<unknown[][]> {
    try {
      return await fetchValues(this.config.spreadsheetId, sheet);
    } catch (error) {
      if (error instanceof RecordShiftError) {
        throw error;
      }
      throw new SourceReadError(
        `Failed to read sheet ${sheet} of spreadsheet ${this.config.spreadsheetId}`,
        { spreadsheetId: this.config.spreadsheetId, sheet },
        { cause: error },
      );
    }
  }
}
