import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { RagSystem } from './RagSystem.js';
import { ConversationAgent } from './ConversationAgent.js';
import { CourseSearchTool, COURSE_SEARCH_TOOL_NAME } from './CourseSearchTool.js';
import { DatabaseHelper } from './DatabaseHelper.js';
import { SessionManager } from './SessionManager.js';
import { ToolRegistry } from './ToolRegistry.js';
import { VectorStore } from './VectorStore.js';
import { KeywordEmbedder } from '../__fixtures__/keyword-embedder.js';
import { ScriptedModelClient, textResponse, toolUseResponse } from '../__fixtures__/scripted-model.js';
import { SYSTEM_PROMPT } from '../prompts.js';
import type { Course, CourseChunk, ModelResponse } from '../types/index.js';

const MCP_COURSE: Course = {
    title: 'MCP Course',
    courseLink: 'https://example.com/mcp',
    lessons: [
        { lessonNumber: 1, title: 'What is MCP', lessonLink: 'https://example.com/mcp/lesson-1' },
        { lessonNumber: 2, title: 'Building servers' },
    ],
};

const MCP_CHUNKS: CourseChunk[] = [
    { courseTitle: 'MCP Course', lessonNumber: 1, chunkIndex: 0, content: 'MCP is a protocol that connects agents to tools' },
    { courseTitle: 'MCP Course', lessonNumber: 2, chunkIndex: 1, content: 'An MCP server exposes tools over a transport' },
];

describe('RagSystem', () => {
    let database: DatabaseHelper;
    let store: VectorStore;
    let registry: ToolRegistry;
    let sessions: SessionManager;

    function createSystem(responses: Array<ModelResponse | Error>) {
        const client = new ScriptedModelClient(responses);
        const rag = new RagSystem({
            store,
            agent: new ConversationAgent(client, { model: 'test-model' }),
            sessionManager: sessions,
            toolRegistry: registry,
        });
        return { rag, client };
    }

    beforeEach(async () => {
        database = new DatabaseHelper(':memory:');
        store = new VectorStore(database, new KeywordEmbedder(), 5);
        registry = new ToolRegistry();
        registry.register(new CourseSearchTool(store));
        sessions = new SessionManager(2);
        await store.addCourseMetadata(MCP_COURSE);
        await store.addCourseContent(MCP_CHUNKS);
    });

    afterEach(() => {
        database.close();
    });

    describe('query', () => {
        it('answers through the search tool and returns its sources', async () => {
            const { rag, client } = createSystem([
                toolUseResponse([{
                    id: 'call_1',
                    name: COURSE_SEARCH_TOOL_NAME,
                    input: { query: 'what is MCP', course_name: 'MCP', lesson_number: 1 },
                }]),
                textResponse('MCP is a protocol that connects agents to tools.'),
            ]);
            const sessionId = sessions.createSession();

            const result = await rag.query('What is MCP?', sessionId);

            expect(result).toEqual({
                answer: 'MCP is a protocol that connects agents to tools.',
                sources: [{ text: 'MCP Course - Lesson 1', url: 'https://example.com/mcp/lesson-1' }],
            });
            expect(client.requests[0].messages).toEqual([
                { role: 'user', content: 'Answer this question about course materials: What is MCP?' },
            ]);
            expect(client.requests[0].tools?.map((t) => t.name)).toEqual([COURSE_SEARCH_TOOL_NAME]);
            expect(client.requests[1].messages[2]).toEqual({
                role: 'user',
                content: [{
                    type: 'tool_result',
                    toolUseId: 'call_1',
                    content: '[MCP Course - Lesson 1]\nMCP is a protocol that connects agents to tools',
                }],
            });
        });

        it('resets tool sources once the query is answered', async () => {
            const { rag } = createSystem([
                toolUseResponse([{ id: 'call_1', name: COURSE_SEARCH_TOOL_NAME, input: { query: 'MCP server' } }]),
                textResponse('Servers expose tools.'),
            ]);

            const result = await rag.query('What does an MCP server do?');

            expect(result.sources).toHaveLength(2);
            expect(registry.collectSources()).toEqual([]);
        });

        it('returns a direct answer with no sources', async () => {
            const { rag } = createSystem([textResponse('Paris.')]);

            await expect(rag.query('What is the capital of France?')).resolves.toEqual({
                answer: 'Paris.',
                sources: [],
            });
        });

        it('leaves sessions alone when no session id is given', async () => {
            const sessionId = sessions.createSession();
            const { rag, client } = createSystem([textResponse('Answer.')]);

            await rag.query('Anything?');

            expect(client.requests[0].system).toBe(SYSTEM_PROMPT);
            expect(sessions.getEntries(sessionId)).toEqual([]);
        });

        it('feeds earlier exchanges of the session into the next query', async () => {
            const { rag, client } = createSystem([
                textResponse('MCP is a protocol.'),
                textResponse('Lesson 2 covers servers.'),
            ]);
            const sessionId = sessions.createSession();

            await rag.query('What is MCP?', sessionId);
            await rag.query('What comes next?', sessionId);

            expect(client.requests[0].system).toBe(SYSTEM_PROMPT);
            expect(client.requests[1].system).toBe(
                `${SYSTEM_PROMPT}\n\nPrevious conversation:\nUser: What is MCP?\nAssistant: MCP is a protocol.`
            );
            expect(sessions.getEntries(sessionId)).toEqual([
                { role: 'user', content: 'What is MCP?' },
                { role: 'assistant', content: 'MCP is a protocol.' },
                { role: 'user', content: 'What comes next?' },
                { role: 'assistant', content: 'Lesson 2 covers servers.' },
            ]);
        });

        it('propagates model failures and records nothing', async () => {
            const failure = new Error('API Error');
            const { rag } = createSystem([failure]);
            const sessionId = sessions.createSession();

            await expect(rag.query('What is MCP?', sessionId)).rejects.toBe(failure);
            expect(sessions.getEntries(sessionId)).toEqual([]);
            expect(registry.collectSources()).toEqual([]);
        });

        it('resets sources when the follow-up call fails', async () => {
            const { rag } = createSystem([
                toolUseResponse([{ id: 'call_1', name: COURSE_SEARCH_TOOL_NAME, input: { query: 'MCP' } }]),
                new Error('API Error'),
            ]);

            await expect(rag.query('What is MCP?')).rejects.toThrow('API Error');
            expect(registry.collectSources()).toEqual([]);
        });
    });

    describe('addCourse', () => {
        it('adds a new course and skips one that is already stored', async () => {
            const { rag } = createSystem([]);
            const course: Course = { title: 'Python for Agents', lessons: [{ lessonNumber: 1, title: 'Basics' }] };
            const chunks: CourseChunk[] = [
                { courseTitle: 'Python for Agents', lessonNumber: 1, chunkIndex: 0, content: 'Python agents' },
            ];

            await expect(rag.addCourse(course, chunks)).resolves.toBe(1);
            await expect(rag.addCourse(course, chunks)).resolves.toBe(0);
            await expect(rag.getCourseAnalytics()).resolves.toEqual({
                totalCourses: 2,
                courseTitles: ['MCP Course', 'Python for Agents'],
            });
        });
    });
});
