import { toErrorMessage } from "../../core/errors";
import { toCoordinate } from "../../core/items/coordinates";
import type { ItemRecord } from "../../core/items/item.types";
import type { CoordinateTagWriter } from "../../ports/CoordinateTagWriter";
import type { MutationAction, MutationFailureReason, MutationResult } from "../../ports/MutationAction";
import { CommonsApiError, type CommonsApiClient } from "../commons/CommonsApiClient";

export const DEFAULT_UPLOAD_COMMENT = "Adding geolocation";

// Returned when the uploaded bytes equal the current file revision.
const UNCHANGED_UPLOAD_CODE = "fileexists-no-change";

const failure = (reason: MutationFailureReason, err?: unknown): MutationResult =>
  err === undefined ? { success: false, reason } : { success: false, reason, message: toErrorMessage(err) };

/**
 * Download, write the page coordinate into EXIF, and optionally upload the
 * result over the same title. Writing the same coordinate again yields the same bytes.
 */
export class GeotagMutationAction implements MutationAction {
  readonly simulated = false;
  private readonly comment: string;

  constructor(
    private readonly api: Pick<CommonsApiClient, "download" | "upload">,
    private readonly tagWriter: CoordinateTagWriter,
    private readonly publish: boolean,
    comment?: string
  ) {
    this.comment = comment ?? DEFAULT_UPLOAD_COMMENT;
  }

  async apply(item: ItemRecord): Promise<MutationResult> {
    if (!item.sourceUrl) return failure("no_source_url");
    const coordinate = toCoordinate(item.lat, item.lon);
    if (!coordinate) return failure("invalid_coordinates");

    let original: Buffer;
    try {
      original = await this.api.download(item.sourceUrl);
    } catch (err) {
      return failure("download_failed", err);
    }

    let tagged: Buffer;
    try {
      tagged = this.tagWriter.writeCoordinate(original, coordinate);
    } catch (err) {
      return failure("transform_failed", err);
    }

    if (!this.publish) return { success: true, published: false };

    try {
      await this.api.upload({ filename: item.id, bytes: tagged, comment: this.comment });
    } catch (err) {
      if (err instanceof CommonsApiError && err.apiCode === UNCHANGED_UPLOAD_CODE) {
        return { success: true, published: false };
      }
      return failure("upload_failed", err);
    }
    return { success: true, published: true };
  }
}
