import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { z } from "zod";
import type { RagSystem } from "./services/RagSystem.js";
import { errorMessage } from "./utils/errors.js";
import { formatAnalytics, formatAnswer } from "./utils/formatting.js";
import Logger from "./utils/logger.js";

export function createServer(rag: RagSystem, version: string = "0.1.0"): McpServer {
  const server = new McpServer(
    {
      name: "courseRag",
      version,
    },
    {
      instructions: `This service answers questions about the loaded course materials.
1) Use list_courses to see which courses are available.
2) Use ask_course_question to ask about course content. The answer lists the lessons it drew on, with links where known.
3) Pass the returned sessionId on follow-up questions so earlier exchanges are taken into account. Use clear_session to start over.
`,
    }
  );

  server.registerTool(
    "ask_course_question",
    {
      description:
        "Ask a question about the course materials. Returns an answer and the course lessons used as sources.",
      inputSchema: {
        question: z.string().trim().min(1).describe("The question to answer"),
        sessionId: z
          .string()
          .optional()
          .describe("Session id from an earlier answer. Omit to start a new session."),
      },
    },
    async (request: { question: string; sessionId?: string }) => {
      const sessionId = request.sessionId ?? rag.sessionManager.createSession();

      try {
        const { answer, sources } = await rag.query(request.question, sessionId);
        return {
          content: [
            {
              type: "text",
              text: formatAnswer(answer, sources, sessionId),
            },
          ],
        };
      } catch (error) {
        Logger.error("Query failed", { sessionId, error: errorMessage(error) });
        throw new Error(`Failed to answer question: ${errorMessage(error)}`);
      }
    }
  );

  server.registerTool(
    "list_courses",
    {
      description: "List the titles of all loaded courses.",
      inputSchema: {},
    },
    async () => {
      const analytics = await rag.getCourseAnalytics();
      return {
        content: [
          {
            type: "text",
            text: formatAnalytics(analytics),
          },
        ],
      };
    }
  );

  server.registerTool(
    "clear_session",
    {
      description: "Forget the conversation history of a session.",
      inputSchema: {
        sessionId: z.string().min(1).describe("The session to clear"),
      },
    },
    async (request: { sessionId: string }) => {
      const { sessionId } = request;
      if (!rag.sessionManager.hasSession(sessionId)) {
        return {
          content: [{ type: "text", text: `Unknown session: ${sessionId}` }],
          isError: true,
        };
      }

      rag.sessionManager.clearSession(sessionId);
      return {
        content: [{ type: "text", text: `Cleared session ${sessionId}` }],
      };
    }
  );

  return server;
}
