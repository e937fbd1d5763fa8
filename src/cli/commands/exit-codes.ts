import { ErrorCode, RecordShiftError } from "../../utils/errors.js";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_CONFIG_ERROR = 2;
export const EXIT_IO_ERROR = 4;

export function exitCodeFor(error: RecordShiftError): number {
  switch (error.code) {
    case ErrorCode.CONFIG_ERROR:
      return EXIT_CONFIG_ERROR;
    case ErrorCode.FILE_IO_ERROR:
      return EXIT_IO_ERROR;
    default:
      return EXIT_FAILURE;
  }
}
