import type { SearchResults } from "../utils/SearchResults.js";

/**
 * A lesson inside a course, as stored in the course catalog
 */
export interface Lesson {
  lessonNumber: number;
  title: string;
  lessonLink?: string;
}

/**
 * Course-level metadata. The title doubles as the course identifier.
 */
export interface Course {
  title: string;
  instructor?: string;
  courseLink?: string;
  lessons: Lesson[];
}

/**
 * A pre-chunked slice of course text
 */
export interface CourseChunk {
  courseTitle: string;
  lessonNumber?: number;
  /** Position of the chunk within its course */
  chunkIndex: number;
  content: string;
}

/**
 * Metadata attached to every search hit, one entry per document
 */
export interface ChunkMetadata {
  courseTitle: string;
  lessonNumber?: number;
  chunkIndex?: number;
}

export interface SearchParams {
  query: string;
  /** Course name hint, resolved by the store against the catalog */
  courseName?: string;
  lessonNumber?: number;
  limit?: number;
}

export interface CourseAnalytics {
  totalCourses: number;
  courseTitles: string[];
}

/**
 * The retrieval contract the search tool consumes
 */
export interface CourseSearchStore {
  search(params: SearchParams): Promise<SearchResults>;
  getLessonLink(courseTitle: string, lessonNumber: number): Promise<string | null>;
}

/**
 * Catalog operations layered on top of retrieval
 */
export interface CourseStore extends CourseSearchStore {
  addCourseMetadata(course: Course): Promise<void>;
  addCourseContent(chunks: CourseChunk[]): Promise<void>;
  getExistingCourseTitles(): Promise<string[]>;
  getCourseCount(): Promise<number>;
  getCourseLink(courseTitle: string): Promise<string | null>;
  clearAllData(): Promise<void>;
}
