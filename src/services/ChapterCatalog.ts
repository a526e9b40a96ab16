import { SOURCE_DEFAULTS } from "../config/constants";
import type { CorpusShape } from "../config/IngestionConfig";
import { buildStandardSeed, STANDARD_SHAPE, type SeedSource, type StructureSeed, type SuraSeed } from "../db/seedData";
import { CorpusValidationError } from "../errors";
import { createLogger } from "../utils/logger";
import { chaptersResponseSchema, describeIssues } from "./payloadSchemas";
import type { RetryClient } from "./RetryClient";

const log = createLogger({ component: "ChapterCatalog" });
const decoder = new TextDecoder("utf-8", { fatal: true });

/**
 * Chapter list from the remote source, used to seed the Suras table.
 */
export class ChapterCatalog {
  private readonly apiBaseUrl: string;
  private readonly language: string;

  constructor(
    private client: RetryClient,
    options: { apiBaseUrl?: string; language?: string } = {}
  ) {
    this.apiBaseUrl = (options.apiBaseUrl ?? SOURCE_DEFAULTS.API_BASE_URL).replace(/\/+$/, "");
    this.language = options.language ?? SOURCE_DEFAULTS.CHAPTER_LANGUAGE;
  }

  get url(): string {
    return `${this.apiBaseUrl}/chapters?language=${encodeURIComponent(this.language)}`;
  }

  /**
   * Fetch and validate every chapter, ordered by id. Throws on any failure: there is no partial seed.
   */
  async fetchChapters(signal?: AbortSignal): Promise<SuraSeed[]> {
    const url = this.url;
    const context = { operation: "ChapterCatalog.fetchChapters", url };
    const outcome = await this.client.fetch({ url, signal });
    if (!outcome.ok) throw outcome.failure.lastError;

    let json: unknown;
    try {
      json = JSON.parse(decoder.decode(outcome.body));
    } catch (err) {
      throw CorpusValidationError.invalidPayload(url, "body is not valid UTF-8 JSON", context, err instanceof Error ? err : undefined);
    }

    const parsed = chaptersResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw CorpusValidationError.invalidPayload(url, describeIssues(parsed.error), context);
    }

    const chapters = [...parsed.data.chapters].sort((a, b) => a.id - b.id);
    chapters.forEach((chapter, index) => {
      if (chapter.id !== index + 1) {
        throw CorpusValidationError.keyMismatch("id", index + 1, chapter.id, context);
      }
    });

    log.info("Chapter catalog fetched", { chapters: chapters.length });
    return chapters.map((c) => ({
      suraId: c.id,
      nameArabic: c.name_arabic,
      revelationOrder: c.revelation_order,
      ayatCount: c.verses_count,
    }));
  }
}

/**
 * Seed source that takes Suras from the chapter catalog and the rest from the standard layout.
 * The catalog is fetched at most once per source.
 */
export function createRemoteSeedSource(catalog: ChapterCatalog, shape: CorpusShape = STANDARD_SHAPE): SeedSource {
  let chapters: Promise<SuraSeed[]> | undefined;
  let structure: StructureSeed | undefined;
  const layout = () => (structure ??= buildStandardSeed(shape));

  return {
    loadSuras() {
      chapters ??= catalog.fetchChapters();
      return chapters;
    },
    async loadJuzs() {
      return layout().juzs;
    },
    async loadHezbs() {
      return layout().hezbs;
    },
    async loadPages() {
      return layout().pages;
    },
  };
}
