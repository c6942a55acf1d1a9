import type {
  Course,
  CourseChunk,
  CourseStore,
  Embedder,
  SearchParams,
} from "../types/index.js";
import { DatabaseHelper, type ContentFilter } from "./DatabaseHelper.js";
import { SearchResults } from "../utils/SearchResults.js";
import { errorMessage } from "../utils/errors.js";
import Logger from "../utils/logger.js";

export class VectorStore implements CourseStore {
  constructor(
    private readonly database: DatabaseHelper,
    private readonly embedder: Embedder,
    private readonly maxResults: number = 5
  ) {}

  /**
   * Semantic search over chunk content. Course names are fuzzy: they are
   * matched against the catalog by embedding distance first.
   * Failures come back as `SearchResults.error`, never as a rejection.
   */
  async search(params: SearchParams): Promise<SearchResults> {
    const { query, courseName, lessonNumber, limit = this.maxResults } = params;

    try {
      const filter: ContentFilter = { lessonNumber };

      if (courseName !== undefined) {
        const courseTitle = await this.resolveCourseName(courseName);
        if (!courseTitle) {
          return SearchResults.empty(`No course found matching '${courseName}'`);
        }
        filter.courseTitle = courseTitle;
      }

      const [queryVector] = await this.embedder.embed([query]);
      const rows = this.database.searchContent(queryVector, filter, limit);
      Logger.debug(`Search returned ${rows.length} chunks`, { filter, limit });

      return SearchResults.fromHits(
        rows.map((row) => ({
          document: row.content,
          metadata: {
            courseTitle: row.courseTitle,
            lessonNumber: row.lessonNumber ?? undefined,
            chunkIndex: row.chunkIndex,
          },
          distance: row.distance,
        }))
      );
    } catch (error) {
      Logger.error("Vector search failed", { error: errorMessage(error), courseName, lessonNumber });
      return SearchResults.empty(`Search error: ${errorMessage(error)}`);
    }
  }

  /**
   * Nearest catalog title for a (possibly partial) course name, or null when
   * the catalog is empty.
   */
  async resolveCourseName(courseName: string): Promise<string | null> {
    const [nameVector] = await this.embedder.embed([courseName]);
    const match = this.database.findNearestCourse(nameVector);
    if (match) {
      Logger.debug(`Resolved course '${courseName}' to '${match.courseTitle}'`, { distance: match.distance });
    }
    return match?.courseTitle ?? null;
  }

  async getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null> {
    const course = this.database.getCourse(courseTitle);
    const lesson = course?.lessons.find((l) => l.lessonNumber === lessonNumber);
    return lesson?.lessonLink ?? null;
  }

  async getCourseLink(courseTitle: string): Promise<string | null> {
    return this.database.getCourse(courseTitle)?.courseLink ?? null;
  }

  async addCourseMetadata(course: Course): Promise<void> {
    const [embedding] = await this.embedder.embed([course.title]);
    this.database.saveCourse(course, embedding);
    Logger.info(`Added course '${course.title}' to catalog`, { lessons: course.lessons.length });
  }

  async addCourseContent(chunks: CourseChunk[]): Promise<void> {
    if (chunks.length === 0) return;
    const embeddings = await this.embedder.embed(chunks.map((c) => c.content));
    this.database.saveChunks(chunks, embeddings);
  }

  async getExistingCourseTitles(): Promise<string[]> {
    return this.database.getCourseTitles();
  }

  async getCourseCount(): Promise<number> {
    return this.database.countCourses();
  }

  async clearAllData(): Promise<void> {
    this.database.clear();
    Logger.info("Cleared course catalog and content");
  }
}
