export const PACKAGE_INFO = {
  name: "recordshift",
  version: "0.1.0",
  description:
    "Migrate user and dependant records from CSV, XML and spreadsheet sources into one canonical schema",
} as const;
