import { CorruptCheckpointError } from "../../src/core/errors";
import {
  parseCheckpointDocument,
  parseCheckpointJson,
  toCheckpointDocument
} from "../../src/core/scan/checkpoint.codec";
import type { ScanState } from "../../src/core/scan/ScanState";

describe("checkpoint codec", () => {
  it("writes absent optional fields as null and reads them back as absent", () => {
    const state: ScanState = {
      needsMutation: [
        { id: "A.jpg", hasAltCoordinateSource: true, hasEmbeddedCoordinate: false, lat: 10.5, lon: -20.25 },
        {
          id: "B.jpg",
          hasAltCoordinateSource: true,
          hasEmbeddedCoordinate: false,
          sourceUrl: "https://upload.example.org/B.jpg",
          author: "Example uploader"
        }
      ],
      needsAlternateAction: ["C.jpg"],
      continuationToken: { kind: "titles", offset: 500 }
    };

    const document = toCheckpointDocument(state);
    expect(document.needs_mutation[0]).toEqual({
      id: "A.jpg",
      has_alt_source: true,
      has_embedded: false,
      lat: 10.5,
      lon: -20.25,
      source_url: null,
      author: null
    });

    expect(parseCheckpointJson(JSON.stringify(document))).toEqual(state);
  });

  it("accepts the legacy field names", () => {
    const state = parseCheckpointDocument({
      needs_exif: [
        { title: "File:A.jpg", has_coords: true, has_exif_gps: false, url: "https://upload.example.org/A.jpg" },
        "File:B.jpg"
      ],
      needs_template: ["File:C.jpg"],
      scan_continue: { lecontinue: "20260101|42" }
    });

    expect(state).toEqual({
      needsMutation: [
        { id: "A.jpg", hasAltCoordinateSource: true, hasEmbeddedCoordinate: false, sourceUrl: "https://upload.example.org/A.jpg" },
        { id: "B.jpg", hasAltCoordinateSource: false, hasEmbeddedCoordinate: false }
      ],
      needsAlternateAction: ["C.jpg"],
      continuationToken: { lecontinue: "20260101|42" }
    });
  });

  it("treats null as an empty checkpoint", () => {
    expect(parseCheckpointDocument(null)).toEqual({ needsMutation: [], needsAlternateAction: [], continuationToken: null });
  });

  it.each([
    { text: "", message: "Invalid checkpoint: not valid JSON" },
    { text: "[1,2]", message: "Invalid checkpoint: top-level value is not an object" },
    { text: '{"needs_mutation":{}}', message: "Invalid checkpoint: needs_mutation is not an array" },
    { text: '{"needs_mutation":[{"lat":1}]}', message: "Invalid checkpoint: needs_mutation[0] has no id" },
    { text: '{"needs_alternate_action":[""]}', message: "Invalid checkpoint: needs_alternate_action[0] is not a title" }
  ])("rejects $text", ({ text, message }) => {
    expect(() => parseCheckpointJson(text)).toThrow(CorruptCheckpointError);
    expect(() => parseCheckpointJson(text)).toThrow(message);
  });
});
