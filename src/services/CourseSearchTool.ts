import { z } from "zod";
import type {
  ChunkMetadata,
  CourseSearchStore,
  Source,
  Tool,
  ToolDefinition,
  ToolOutput,
} from "../types/index.js";
import type { SearchResults } from "../utils/SearchResults.js";
import { errorMessage } from "../utils/errors.js";
import Logger from "../utils/logger.js";

export const COURSE_SEARCH_TOOL_NAME = "search_course_content";

const inputSchema = z.object({
  query: z.string().min(1),
  course_name: z.string().min(1).optional(),
  lesson_number: z.number().int().optional(),
});

export interface CourseSearchParams {
  query: string;
  courseName?: string;
  lessonNumber?: number;
}

function describeFilters(courseName?: string, lessonNumber?: number): string {
  let filterInfo = "";
  if (courseName !== undefined) filterInfo += ` in course '${courseName}'`;
  if (lessonNumber !== undefined) filterInfo += ` in lesson ${lessonNumber}`;
  return filterInfo;
}

function sourceLabel(metadata: ChunkMetadata): string {
  return metadata.lessonNumber === undefined
    ? metadata.courseTitle
    : `${metadata.courseTitle} - Lesson ${metadata.lessonNumber}`;
}

/**
 * Searches course content with optional course and lesson filters and
 * renders the hits as labeled text blocks for the model.
 */
export class CourseSearchTool implements Tool {
  private _lastSources: Source[] = [];

  constructor(private readonly store: CourseSearchStore) {}

  get lastSources(): ReadonlyArray<Source> {
    return this._lastSources;
  }

  definition(): ToolDefinition {
    return {
      name: COURSE_SEARCH_TOOL_NAME,
      description: "Search course materials with smart course name matching and lesson filtering",
      inputSchema: {
        type: "object",
        properties: {
          query: {
            type: "string",
            description: "What to search for in the course content",
          },
          course_name: {
            type: "string",
            description: "Course title (partial matches work, e.g. 'MCP', 'Introduction')",
          },
          lesson_number: {
            type: "integer",
            description: "Specific lesson number to search within (e.g. 1, 2, 3)",
          },
        },
        required: ["query"],
      },
    };
  }

  async execute(input: Record<string, unknown>): Promise<ToolOutput> {
    const parsed = inputSchema.safeParse(input);
    if (!parsed.success) {
      const problems = parsed.error.issues
        .map((issue) => `${issue.path.join(".") || "input"}: ${issue.message}`)
        .join("; ");
      Logger.warn(`Rejected ${COURSE_SEARCH_TOOL_NAME} input`, { problems });
      return {
        content: `Invalid input for ${COURSE_SEARCH_TOOL_NAME}: ${problems}`,
        sources: [],
        isError: true,
      };
    }

    const { query, course_name, lesson_number } = parsed.data;
    return this.search({ query, courseName: course_name, lessonNumber: lesson_number });
  }

  async search(params: CourseSearchParams): Promise<ToolOutput> {
    const { query, courseName, lessonNumber } = params;
    const results = await this.store.search({ query, courseName, lessonNumber });

    if (results.error) {
      return { content: results.error, sources: [], isError: true };
    }

    if (results.isEmpty()) {
      this._lastSources = [];
      return {
        content: `No relevant content found${describeFilters(courseName, lessonNumber)}.`,
        sources: [],
      };
    }

    const sources = await this.buildSources(results);
    this._lastSources = sources;

    return { content: this.formatResults(results), sources: [...sources] };
  }

  resetSources(): void {
    this._lastSources = [];
  }

  private formatResults(results: SearchResults): string {
    return results
      .hits()
      .map(({ document, metadata }) => `[${sourceLabel(metadata)}]\n${document}`)
      .join("\n\n");
  }

  private async buildSources(results: SearchResults): Promise<Source[]> {
    const sources: Source[] = [];
    for (const metadata of results.metadata) {
      sources.push({ text: sourceLabel(metadata), url: await this.lessonLink(metadata) });
    }
    return sources;
  }

  private async lessonLink(metadata: ChunkMetadata): Promise<string | null> {
    if (metadata.lessonNumber === undefined) return null;
    try {
      return await this.store.getLessonLink(metadata.courseTitle, metadata.lessonNumber);
    } catch (error) {
      Logger.warn("Lesson link lookup failed", {
        courseTitle: metadata.courseTitle,
        lessonNumber: metadata.lessonNumber,
        error: errorMessage(error),
      });
      return null;
    }
  }
}
