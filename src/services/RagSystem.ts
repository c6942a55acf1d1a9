import type { Course, CourseAnalytics, CourseChunk, CourseStore, Source } from "../types/index.js";
import type { ConversationAgent } from "./ConversationAgent.js";
import type { SessionManager } from "./SessionManager.js";
import type { ToolRegistry } from "./ToolRegistry.js";
import { courseQuestionPrompt } from "../prompts.js";
import Logger from "../utils/logger.js";

export interface RagSystemDeps {
  store: CourseStore;
  agent: ConversationAgent;
  sessionManager: SessionManager;
  toolRegistry: ToolRegistry;
}

export interface QueryResult {
  answer: string;
  sources: Source[];
}

/**
 * Entry point for answering course questions. Pulls session history, runs the
 * agent with the registered tools and records the exchange.
 */
export class RagSystem {
  readonly store: CourseStore;
  readonly sessionManager: SessionManager;
  private readonly agent: ConversationAgent;
  private readonly toolRegistry: ToolRegistry;

  constructor(deps: RagSystemDeps) {
    this.store = deps.store;
    this.agent = deps.agent;
    this.sessionManager = deps.sessionManager;
    this.toolRegistry = deps.toolRegistry;
  }

  async query(question: string, sessionId?: string): Promise<QueryResult> {
    const history = sessionId ? this.sessionManager.getConversationHistory(sessionId) : null;

    try {
      const result = await this.agent.generate({
        query: courseQuestionPrompt(question),
        conversationHistory: history,
        tools: this.toolRegistry.getDefinitions(),
        toolRegistry: this.toolRegistry,
      });

      if (sessionId) {
        this.sessionManager.addExchange(sessionId, question, result.answer);
      }

      Logger.debug("Answered query", { sessionId, sources: result.sources.length });
      return { answer: result.answer, sources: result.sources };
    } finally {
      this.toolRegistry.resetSources();
    }
  }

  /**
   * Store a course and its chunks unless a course with the same title exists.
   * Returns the number of chunks added.
   */
  async addCourse(course: Course, chunks: CourseChunk[]): Promise<number> {
    const existing = await this.store.getExistingCourseTitles();
    if (existing.includes(course.title)) {
      Logger.info(`Course already loaded: ${course.title}`);
      return 0;
    }

    await this.store.addCourseMetadata(course);
    await this.store.addCourseContent(chunks);
    Logger.info(`Added course: ${course.title}`, { chunks: chunks.length });
    return chunks.length;
  }

  async getCourseAnalytics(): Promise<CourseAnalytics> {
    const [totalCourses, courseTitles] = await Promise.all([
      this.store.getCourseCount(),
      this.store.getExistingCourseTitles(),
    ]);
    return { totalCourses, courseTitles };
  }
}
