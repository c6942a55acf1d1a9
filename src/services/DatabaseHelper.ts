import * as sqliteVec from "sqlite-vec";
import Database from "better-sqlite3";
import { z } from "zod";
import fs from "fs";
import path from "path";
import type { Course, CourseChunk, Lesson } from "../types/index.js";
import Logger from "../utils/logger.js";
import { resolveCachePath } from "../utils/cache.js";

export interface CatalogMatch {
  courseTitle: string;
  distance: number;
}

export interface ContentRow {
  content: string;
  courseTitle: string;
  lessonNumber: number | null;
  chunkIndex: number;
  distance: number;
}

export interface ContentFilter {
  courseTitle?: string;
  lessonNumber?: number;
}

interface CatalogRow {
  course_title: string;
  instructor: string | null;
  course_link: string | null;
  lessons_json: string;
}

function vectorParam(vector: Float32Array): string {
  return JSON.stringify(Array.from(vector));
}

const lessonsSchema = z.array(
  z.object({
    lessonNumber: z.number().int(),
    title: z.string(),
    lessonLink: z.string().optional(),
  })
);

function parseLessons(json: string): Lesson[] {
  const parsed = lessonsSchema.safeParse(JSON.parse(json));
  return parsed.success ? parsed.data : [];
}

/**
 * SQLite persistence for the course catalog and chunk vectors. Distances are
 * computed with sqlite-vec's cosine distance so filters apply before ranking.
 */
export class DatabaseHelper {
  private _db: Database.Database | null = null;
  private _dbPath: string;

  constructor(dbPath: string = ":memory:") {
    this._dbPath = resolveCachePath(dbPath);
  }

  getDatabase(): Database.Database {
    if (!this._db) {
      if (this._dbPath !== ":memory:") {
        const dir = path.dirname(this._dbPath);
        if (!fs.existsSync(dir)) {
          fs.mkdirSync(dir, { recursive: true });
        }
      }

      const db = new Database(this._dbPath);
      sqliteVec.load(db);
      this.initializeSchema(db);
      this._db = db;
    }
    return this._db;
  }

  private initializeSchema(db: Database.Database): void {
    db.exec(`
      CREATE TABLE IF NOT EXISTS course_catalog (
        course_title TEXT PRIMARY KEY,
        instructor TEXT,
        course_link TEXT,
        lessons_json TEXT NOT NULL DEFAULT '[]',
        embedding BLOB NOT NULL
      );

      CREATE TABLE IF NOT EXISTS course_content (
        chunk_id TEXT PRIMARY KEY,
        course_title TEXT NOT NULL,
        lesson_number INTEGER,
        chunk_index INTEGER NOT NULL,
        content TEXT NOT NULL,
        embedding BLOB NOT NULL
      );

      CREATE INDEX IF NOT EXISTS idx_course_content_filter
        ON course_content (course_title, lesson_number);
    `);
  }

  saveCourse(course: Course, embedding: Float32Array): void {
    const db = this.getDatabase();
    db.prepare(`
      INSERT OR REPLACE INTO course_catalog (course_title, instructor, course_link, lessons_json, embedding)
      VALUES (?, ?, ?, ?, vec_f32(?))
    `).run(
      course.title,
      course.instructor ?? null,
      course.courseLink ?? null,
      JSON.stringify(course.lessons),
      vectorParam(embedding)
    );
  }

  saveChunks(chunks: CourseChunk[], embeddings: Float32Array[]): void {
    if (chunks.length === 0) return;
    Logger.info(`Saving ${chunks.length} chunks to database...`);

    const db = this.getDatabase();
    const insertStmt = db.prepare(`
      INSERT OR REPLACE INTO course_content (chunk_id, course_title, lesson_number, chunk_index, content, embedding)
      VALUES (?, ?, ?, ?, ?, vec_f32(?))
    `);

    const insertAll = db.transaction((rows: CourseChunk[]) => {
      rows.forEach((chunk, i) => {
        insertStmt.run(
          `${chunk.courseTitle}_${chunk.chunkIndex}`,
          chunk.courseTitle,
          chunk.lessonNumber ?? null,
          chunk.chunkIndex,
          chunk.content,
          vectorParam(embeddings[i])
        );
      });
    });
    insertAll(chunks);
  }

  findNearestCourse(queryVector: Float32Array): CatalogMatch | null {
    const row = this.getDatabase()
      .prepare(`
        SELECT course_title, vec_distance_cosine(embedding, vec_f32(?)) AS distance
        FROM course_catalog
        ORDER BY distance
        LIMIT 1
      `)
      .get(vectorParam(queryVector)) as { course_title: string; distance: number } | undefined;

    return row ? { courseTitle: row.course_title, distance: row.distance } : null;
  }

  searchContent(queryVector: Float32Array, filter: ContentFilter, limit: number): ContentRow[] {
    const rows = this.getDatabase()
      .prepare(`
        SELECT
          content,
          course_title,
          lesson_number,
          chunk_index,
          vec_distance_cosine(embedding, vec_f32(@vector)) AS distance
        FROM course_content
        WHERE (@courseTitle IS NULL OR course_title = @courseTitle)
          AND (@lessonNumber IS NULL OR lesson_number = @lessonNumber)
        ORDER BY distance, chunk_index
        LIMIT @limit
      `)
      .all({
        vector: vectorParam(queryVector),
        courseTitle: filter.courseTitle ?? null,
        lessonNumber: filter.lessonNumber ?? null,
        limit,
      }) as Array<{
        content: string;
        course_title: string;
        lesson_number: number | null;
        chunk_index: number;
        distance: number;
      }>;

    return rows.map((row) => ({
      content: row.content,
      courseTitle: row.course_title,
      lessonNumber: row.lesson_number,
      chunkIndex: row.chunk_index,
      distance: row.distance,
    }));
  }

  getCourse(courseTitle: string): Course | null {
    const row = this.getDatabase()
      .prepare(
        "SELECT course_title, instructor, course_link, lessons_json FROM course_catalog WHERE course_title = ?"
      )
      .get(courseTitle) as CatalogRow | undefined;

    if (!row) return null;
    return {
      title: row.course_title,
      instructor: row.instructor ?? undefined,
      courseLink: row.course_link ?? undefined,
      lessons: parseLessons(row.lessons_json),
    };
  }

  getCourseTitles(): string[] {
    const rows = this.getDatabase()
      .prepare("SELECT course_title FROM course_catalog ORDER BY rowid")
      .all() as Array<{ course_title: string }>;
    return rows.map((row) => row.course_title);
  }

  countCourses(): number {
    const result = this.getDatabase()
      .prepare("SELECT COUNT(*) as count FROM course_catalog")
      .get() as { count: number };
    return result.count;
  }

  clear(): void {
    this.getDatabase().exec("DELETE FROM course_content; DELETE FROM course_catalog;");
  }

  close(): void {
    this._db?.close();
    this._db = null;
  }
}
