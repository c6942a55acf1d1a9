import { readFile } from "fs/promises";
import { z } from "zod";
import type { Course, CourseChunk } from "../types/index.js";
import { CourseRagError } from "./errors.js";

const lessonSchema = z.object({
  lessonNumber: z.number().int().nonnegative(),
  title: z.string().min(1),
  lessonLink: z.string().url().optional(),
  chunks: z.array(z.string().min(1)).default([]),
});

const courseSchema = z.object({
  title: z.string().trim().min(1),
  instructor: z.string().optional(),
  courseLink: z.string().url().optional(),
  lessons: z.array(lessonSchema).default([]),
});

export const courseFileSchema = z.object({
  courses: z.array(courseSchema),
});

export type CourseFile = z.infer<typeof courseFileSchema>;

export interface LoadedCourse {
  course: Course;
  chunks: CourseChunk[];
}

/**
 * Splits parsed course documents into catalog entries and content chunks.
 * Chunk indices count across the whole course, in lesson order.
 */
export function toLoadedCourses(file: CourseFile): LoadedCourse[] {
  return file.courses.map((entry) => {
    const course: Course = {
      title: entry.title,
      instructor: entry.instructor,
      courseLink: entry.courseLink,
      lessons: entry.lessons.map(({ lessonNumber, title, lessonLink }) => ({ lessonNumber, title, lessonLink })),
    };

    let chunkIndex = 0;
    const chunks: CourseChunk[] = [];
    for (const lesson of entry.lessons) {
      for (const content of lesson.chunks) {
        chunks.push({ courseTitle: entry.title, lessonNumber: lesson.lessonNumber, chunkIndex, content });
        chunkIndex += 1;
      }
    }

    return { course, chunks };
  });
}

export function parseCourseFile(data: unknown, origin = "course data"): LoadedCourse[] {
  const parsed = courseFileSchema.safeParse(data);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CourseRagError(`Invalid ${origin} - ${problems}`, "INVALID_COURSE_FILE", parsed.error);
  }
  return toLoadedCourses(parsed.data);
}

export async function loadCourseFile(filePath: string): Promise<LoadedCourse[]> {
  const raw = await readFile(filePath, "utf-8");
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (error) {
    throw new CourseRagError(`Course file ${filePath} is not valid JSON`, "INVALID_COURSE_FILE", error);
  }
  return parseCourseFile(data, `course file ${filePath}`);
}
