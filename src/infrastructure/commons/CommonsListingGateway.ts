import { stripFilePrefix } from "../../core/items/classifyItem";
import type { RawEntry } from "../../core/items/item.types";
import type { ContinuationCursor, JsonValue } from "../../core/scan/ScanState";
import type { ListingGateway, ListingPage, ListingScope } from "../../ports/ListingGateway";
import { consoleEventLogger, type EventLogger } from "../../shared/logging/eventLogger";
import { isRecord, type ApiParams, type ApiResponse, type CommonsApiClient } from "./CommonsApiClient";

const FILE_NAMESPACE = 6;
const CATEGORY_NAMESPACE = 14;

type ApiContinue = Record<string, string>;

type FrontierEntry = { category: string; depth: number };

type UserCursor = { kind: "user"; continue: ApiContinue };
type CategoryCursor = {
  kind: "category";
  frontier: FrontierEntry[];
  visited: string[];
  continue: ApiContinue | null;
};
type TitlesCursor = { kind: "titles"; offset: number };

type GatewayCursor = UserCursor | CategoryCursor | TitlesCursor;

export const stripCategoryPrefix = (title: string): string =>
  title.startsWith("Category:") ? title.slice("Category:".length) : title;

const parseApiContinue = (value: unknown): ApiContinue | null => {
  if (!isRecord(value)) return null;
  const result: ApiContinue = {};
  for (const [key, raw] of Object.entries(value)) {
    if (typeof raw === "string" || typeof raw === "number") result[key] = String(raw);
  }
  return Object.keys(result).length > 0 ? result : null;
};

const parseFrontier = (value: unknown): FrontierEntry[] | null => {
  if (!Array.isArray(value)) return null;
  const frontier: FrontierEntry[] = [];
  for (const entry of value) {
    if (!isRecord(entry) || typeof entry.category !== "string" || typeof entry.depth !== "number") return null;
    frontier.push({ category: entry.category, depth: entry.depth });
  }
  return frontier;
};

const parseCursor = (cursor: ContinuationCursor | null): GatewayCursor | null => {
  if (!isRecord(cursor)) return null;
  switch (cursor.kind) {
    case "user": {
      const cont = parseApiContinue(cursor.continue);
      return cont ? { kind: "user", continue: cont } : null;
    }
    case "category": {
      const frontier = parseFrontier(cursor.frontier);
      const visited = Array.isArray(cursor.visited) ? cursor.visited.filter((v): v is string => typeof v === "string") : null;
      if (!frontier || !visited) return null;
      return { kind: "category", frontier, visited, continue: parseApiContinue(cursor.continue) };
    }
    case "titles":
      return typeof cursor.offset === "number" && Number.isInteger(cursor.offset) && cursor.offset >= 0
        ? { kind: "titles", offset: cursor.offset }
        : null;
    default:
      return null;
  }
};

const toJson = (cursor: GatewayCursor): JsonValue => {
  switch (cursor.kind) {
    case "user":
      return { kind: "user", continue: { ...cursor.continue } };
    case "category":
      return {
        kind: "category",
        frontier: cursor.frontier.map((entry) => ({ category: entry.category, depth: entry.depth })),
        visited: [...cursor.visited],
        continue: cursor.continue ? { ...cursor.continue } : null
      };
    case "titles":
      return { kind: "titles", offset: cursor.offset };
  }
};

const readList = (response: ApiResponse, listName: string): Record<string, unknown>[] => {
  const query = isRecord(response.query) ? response.query : {};
  const list = query[listName];
  return Array.isArray(list) ? list.filter(isRecord) : [];
};

/**
 * Listing over a MediaWiki API. Uploader scopes follow the upload log, category
 * scopes walk subcategories breadth-first up to `maxDepth`, title scopes page a
 * fixed list. The cursor records enough to resume any of them.
 */
export class CommonsListingGateway implements ListingGateway {
  private readonly logger: EventLogger;

  constructor(
    private readonly api: Pick<CommonsApiClient, "get">,
    private readonly pageLimit = 500,
    logger?: EventLogger
  ) {
    this.logger = logger ?? consoleEventLogger;
  }

  async listPage(scope: ListingScope, cursor: ContinuationCursor | null): Promise<ListingPage> {
    const parsed = parseCursor(cursor);
    if (cursor !== null && (parsed === null || parsed.kind !== scope.kind)) {
      this.logger.warn("listing.cursor_discarded", { scope: scope.kind });
    }
    const resume = parsed !== null && parsed.kind === scope.kind ? parsed : null;

    switch (scope.kind) {
      case "user":
        return this.listUploads(scope.user, resume?.kind === "user" ? resume : null);
      case "category":
        return this.listCategory(scope.category, scope.maxDepth, resume?.kind === "category" ? resume : null);
      case "titles":
        return this.listTitles(scope.titles, resume?.kind === "titles" ? resume : null);
    }
  }

  private async listUploads(user: string, cursor: UserCursor | null): Promise<ListingPage> {
    let cont: ApiContinue | null = cursor?.continue ?? null;

    while (true) {
      const params: ApiParams = {
        action: "query",
        list: "logevents",
        letype: "upload",
        leuser: user,
        leprop: "title",
        lelimit: this.pageLimit,
        ...(cont ?? {})
      };
      const response = await this.api.get(params);
      const entries: RawEntry[] = readList(response, "logevents")
        .map((event) => event.title)
        .filter((title): title is string => typeof title === "string" && title !== "")
        .map((title) => ({ id: stripFilePrefix(title) }));

      cont = parseApiContinue(response.continue);
      const nextCursor = cont ? toJson({ kind: "user", continue: cont }) : null;
      if (entries.length > 0 || !cont) return { entries, nextCursor };
    }
  }

  private async listCategory(root: string, maxDepth: number, cursor: CategoryCursor | null): Promise<ListingPage> {
    const rootName = stripCategoryPrefix(root);
    const state: CategoryCursor = cursor ?? {
      kind: "category",
      frontier: [{ category: rootName, depth: 0 }],
      visited: [rootName],
      continue: null
    };
    const visited = new Set(state.visited);
    const entries: RawEntry[] = [];

    while (state.frontier.length > 0 && entries.length === 0) {
      const current = state.frontier[0];
      const response = await this.api.get({
        action: "query",
        list: "categorymembers",
        cmtitle: `Category:${current.category}`,
        cmtype: "file|subcat",
        cmprop: "title",
        cmlimit: this.pageLimit,
        ...(state.continue ?? {})
      });

      for (const member of readList(response, "categorymembers")) {
        if (typeof member.title !== "string") continue;
        if (member.ns === FILE_NAMESPACE) {
          entries.push({ id: stripFilePrefix(member.title) });
        } else if (member.ns === CATEGORY_NAMESPACE && current.depth < maxDepth) {
          const name = stripCategoryPrefix(member.title);
          if (visited.has(name)) continue;
          visited.add(name);
          state.visited.push(name);
          state.frontier.push({ category: name, depth: current.depth + 1 });
        }
      }

      state.continue = parseApiContinue(response.continue);
      if (!state.continue) state.frontier.shift();
    }

    return { entries, nextCursor: state.frontier.length > 0 ? toJson(state) : null };
  }

  private async listTitles(titles: readonly string[], cursor: TitlesCursor | null): Promise<ListingPage> {
    const offset = cursor?.offset ?? 0;
    const end = Math.min(titles.length, offset + this.pageLimit);
    const entries = titles.slice(offset, end).map((title) => ({ id: stripFilePrefix(title.trim()) }));
    return {
      entries,
      nextCursor: end < titles.length ? toJson({ kind: "titles", offset: end }) : null
    };
  }
}
