import OpenAI from "openai";
import type { AppConfig } from "./config.js";
import { ConversationAgent } from "./services/ConversationAgent.js";
import { CourseSearchTool } from "./services/CourseSearchTool.js";
import { DatabaseHelper } from "./services/DatabaseHelper.js";
import { EmbeddingService } from "./services/EmbeddingService.js";
import { ModelService } from "./services/ModelService.js";
import { RagSystem } from "./services/RagSystem.js";
import { SessionManager } from "./services/SessionManager.js";
import { ToolRegistry } from "./services/ToolRegistry.js";
import { VectorStore } from "./services/VectorStore.js";
import Logger from "./utils/logger.js";

export interface RagRuntime {
  rag: RagSystem;
  database: DatabaseHelper;
}

/**
 * Wires the RAG system to OpenAI and the on-disk vector store.
 */
export function createRagSystem(config: AppConfig): RagRuntime {
  const openai = new OpenAI({
    apiKey: config.openaiApiKey,
    ...(config.openaiBaseUrl ? { baseURL: config.openaiBaseUrl } : {}),
  });

  const database = new DatabaseHelper(config.vectorDbPath);
  const embedder = new EmbeddingService(openai, config.embeddingModel, config.embeddingBatchSize);
  const store = new VectorStore(database, embedder, config.maxResults);

  const toolRegistry = new ToolRegistry();
  toolRegistry.register(new CourseSearchTool(store));

  const agent = new ConversationAgent(new ModelService(openai), {
    model: config.chatModel,
    maxTokens: config.maxTokens,
  });

  Logger.debug("RAG system wired", {
    chatModel: config.chatModel,
    embeddingModel: config.embeddingModel,
    tools: toolRegistry.size,
  });

  return {
    rag: new RagSystem({
      store,
      agent,
      sessionManager: new SessionManager(config.maxHistory),
      toolRegistry,
    }),
    database,
  };
}
