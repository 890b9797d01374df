import { parse } from "csv-parse/sync";
import { promises as fs } from "fs";
import path from "path";
import { stripFilePrefix } from "../../core/items/classifyItem";

const dedupe = (titles: string[]): string[] => Array.from(new Set(titles));

const isRowList = (value: unknown): value is string[][] =>
  Array.isArray(value) && value.every((row) => Array.isArray(row) && row.every((cell) => typeof cell === "string"));

/** Titles from a CSV with a `title` header column (case-insensitive). */
export const parseTitleCsv = (text: string): string[] => {
  const rows: unknown = parse(text, {
    bom: true,
    trim: true,
    skip_empty_lines: true,
    relax_column_count: true
  });
  if (!isRowList(rows)) throw new Error("CSV title list could not be read as rows of text");

  const [header, ...records] = rows;
  if (!header) return [];
  const column = header.map((name) => name.toLowerCase()).indexOf("title");
  if (column === -1) throw new Error("CSV title list needs a 'title' column");

  return dedupe(
    records
      .map((record) => record[column] ?? "")
      .filter((title) => title !== "")
      .map(stripFilePrefix)
  );
};

/** One title per line; blank lines and lines starting with # are ignored. */
export const parsePlainTitleList = (text: string): string[] =>
  dedupe(
    text
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line !== "" && !line.startsWith("#"))
      .map(stripFilePrefix)
  );

export const readTitleList = async (filePath: string): Promise<string[]> => {
  const text = await fs.readFile(filePath, "utf8");
  return path.extname(filePath).toLowerCase() === ".csv" ? parseTitleCsv(text) : parsePlainTitleList(text);
};
