import { readFile } from "node:fs/promises";
import { parquetMetadata } from "hyparquet";
import { bigIntToNumber } from "./typeGuards";

// Read a local Parquet file into memory
export async function readParquetFile(filePath: string): Promise<ArrayBuffer> {
  const contents = await readFile(filePath);
  return new Uint8Array(contents).buffer;
}

// Number of rows (frames) recorded in the file footer
export async function readParquetRowCount(filePath: string): Promise<number> {
  const metadata = parquetMetadata(await readParquetFile(filePath));
  return bigIntToNumber(metadata.num_rows);
}
