import { formatModesTable } from "../formatter.js";

export function runModes(color = true): void {
  process.stdout.write(formatModesTable(color));
  process.stdout.write("\n");
}
