import type { CourseAnalytics, Source } from "../types/index.js";

export function formatSource(source: Source): string {
  return source.url ? `${source.text} (${source.url})` : source.text;
}

/**
 * Renders an answer for an MCP client: the answer text, a numbered source
 * list when there are sources, and the session id to continue with.
 */
export function formatAnswer(answer: string, sources: ReadonlyArray<Source>, sessionId?: string): string {
  const sections = [answer.trim()];

  if (sources.length > 0) {
    const lines = sources.map((source, i) => `${i + 1}. ${formatSource(source)}`);
    sections.push(`Sources:\n${lines.join("\n")}`);
  }

  if (sessionId) {
    sections.push(`Session: ${sessionId}`);
  }

  return sections.join("\n\n");
}

export function formatAnalytics(analytics: CourseAnalytics): string {
  if (analytics.totalCourses === 0) {
    return "No courses loaded.";
  }

  const noun = analytics.totalCourses === 1 ? "course" : "courses";
  const lines = analytics.courseTitles.map((title) => `- ${title}`);
  return `${analytics.totalCourses} ${noun} available:\n${lines.join("\n")}`;
}
