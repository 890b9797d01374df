import { promises as fs } from "fs";
import os from "os";
import path from "path";
import { parsePlainTitleList, parseTitleCsv, readTitleList } from "../../src/infrastructure/files/titleList";

describe("title lists", () => {
  it("reads quoted titles with commas and escaped quotes", () => {
    const csv = 'title,note\n"File:Harbour, at dusk.jpg",x\n"Said ""hi"".jpg",y\n';
    expect(parseTitleCsv(csv)).toEqual(["Harbour, at dusk.jpg", 'Said "hi".jpg']);
  });

  it("ignores a byte order mark and rows shorter than the header", () => {
    expect(parseTitleCsv("\uFEFFid,title\n1,A.jpg\n2\n")).toEqual(["A.jpg"]);
  });

  it("returns nothing for an empty file", () => {
    expect(parseTitleCsv("")).toEqual([]);
  });

  it("reads the title column, strips prefixes and drops duplicates", () => {
    const csv = 'id,Title\r\n1,"File:A, B.jpg"\r\n2,C.jpg\r\n3,File:C.jpg\r\n4,\r\n';
    expect(parseTitleCsv(csv)).toEqual(["A, B.jpg", "C.jpg"]);
  });

  it("requires a title column", () => {
    expect(() => parseTitleCsv("name\nA.jpg\n")).toThrow("CSV title list needs a 'title' column");
  });

  it("skips blank and comment lines in plain lists", () => {
    expect(parsePlainTitleList("# uploads\nFile:A.jpg\n\n  B.jpg  \nA.jpg\n")).toEqual(["A.jpg", "B.jpg"]);
  });

  it("picks the parser from the file extension", async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), "geotag-titles-"));
    try {
      await fs.writeFile(path.join(dir, "list.csv"), "title\nA.jpg\n");
      await fs.writeFile(path.join(dir, "list.txt"), "title\nA.jpg\n");

      await expect(readTitleList(path.join(dir, "list.csv"))).resolves.toEqual(["A.jpg"]);
      await expect(readTitleList(path.join(dir, "list.txt"))).resolves.toEqual(["title", "A.jpg"]);
    } finally {
      await fs.rm(dir, { recursive: true, force: true });
    }
  });
});
