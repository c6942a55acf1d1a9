import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { VectorStore } from './VectorStore.js';
import { DatabaseHelper } from './DatabaseHelper.js';
import { KeywordEmbedder } from '../__fixtures__/keyword-embedder.js';
import type { Course, CourseChunk, Embedder } from '../types/index.js';

const MCP_COURSE: Course = {
    title: 'Introduction to MCP',
    instructor: 'Test Instructor',
    courseLink: 'https://example.com/mcp',
    lessons: [
        { lessonNumber: 1, title: 'What is MCP', lessonLink: 'https://example.com/mcp/1' },
        { lessonNumber: 2, title: 'Servers', lessonLink: 'https://example.com/mcp/2' },
    ],
};

const PYTHON_COURSE: Course = {
    title: 'Python for Agents',
    lessons: [
        { lessonNumber: 1, title: 'Basics' },
        { lessonNumber: 2, title: 'Retrieval' },
    ],
};

const CHUNKS: CourseChunk[] = [
    { courseTitle: 'Introduction to MCP', lessonNumber: 1, chunkIndex: 0, content: 'MCP is a protocol for tools' },
    { courseTitle: 'Introduction to MCP', lessonNumber: 2, chunkIndex: 1, content: 'Servers expose MCP resources' },
    { courseTitle: 'Python for Agents', lessonNumber: 1, chunkIndex: 0, content: 'Python agents call tools' },
    { courseTitle: 'Python for Agents', lessonNumber: 2, chunkIndex: 1, content: 'Vector search with Python' },
];

describe('VectorStore', () => {
    let database: DatabaseHelper;
    let store: VectorStore;

    beforeEach(async () => {
        database = new DatabaseHelper(':memory:');
        store = new VectorStore(database, new KeywordEmbedder(), 5);
        await store.addCourseMetadata(MCP_COURSE);
        await store.addCourseMetadata(PYTHON_COURSE);
        await store.addCourseContent(CHUNKS);
    });

    afterEach(() => {
        database.close();
    });

    describe('search', () => {
        it('ranks chunks by distance to the query', async () => {
            const results = await store.search({ query: 'MCP protocol', limit: 2 });

            expect(results.error).toBeNull();
            expect(results.documents).toEqual(['MCP is a protocol for tools', 'Servers expose MCP resources']);
            expect(results.distances[0]).toBeCloseTo(0, 5);
            expect(results.distances[1]).toBeGreaterThan(results.distances[0]);
        });

        it('resolves a partial course name and filters by lesson', async () => {
            const results = await store.search({ query: 'protocol', courseName: 'mcp', lessonNumber: 2 });

            expect(results.documents).toEqual(['Servers expose MCP resources']);
            expect(results.metadata).toEqual([
                { courseTitle: 'Introduction to MCP', lessonNumber: 2, chunkIndex: 1 },
            ]);
        });

        it('only returns chunks of the resolved course', async () => {
            const results = await store.search({ query: 'tools', courseName: 'python agents' });

            expect(results.size).toBe(2);
            expect(results.metadata.every((m) => m.courseTitle === 'Python for Agents')).toBe(true);
        });

        it('uses the configured result limit by default', async () => {
            const limited = new VectorStore(database, new KeywordEmbedder(), 3);
            const results = await limited.search({ query: 'tools' });

            expect(results.size).toBe(3);
        });

        it('returns an empty result without error when filters match nothing', async () => {
            const results = await store.search({ query: 'protocol', lessonNumber: 9 });

            expect(results.isEmpty()).toBe(true);
            expect(results.error).toBeNull();
        });

        it('reports an unknown course when the catalog is empty', async () => {
            await store.clearAllData();
            const results = await store.search({ query: 'protocol', courseName: 'Anything' });

            expect(results.error).toBe("No course found matching 'Anything'");
            expect(results.documents).toEqual([]);
        });

        it('turns embedding failures into an error result', async () => {
            const failing: Embedder = {
                embed: async () => {
                    throw new Error('embedding offline');
                },
            };
            const broken = new VectorStore(database, failing);

            const results = await broken.search({ query: 'protocol' });

            expect(results.error).toBe('Search error: embedding offline');
            expect(results.isEmpty()).toBe(true);
        });
    });

    describe('catalog', () => {
        it('looks up lesson links', async () => {
            expect(await store.getLessonLink('Introduction to MCP', 1)).toBe('https://example.com/mcp/1');
            expect(await store.getLessonLink('Introduction to MCP', 3)).toBeNull();
            expect(await store.getLessonLink('Python for Agents', 1)).toBeNull();
            expect(await store.getLessonLink('Unknown Course', 1)).toBeNull();
        });

        it('looks up course links', async () => {
            expect(await store.getCourseLink('Introduction to MCP')).toBe('https://example.com/mcp');
            expect(await store.getCourseLink('Python for Agents')).toBeNull();
        });

        it('lists titles in insertion order and counts courses', async () => {
            expect(await store.getExistingCourseTitles()).toEqual(['Introduction to MCP', 'Python for Agents']);
            expect(await store.getCourseCount()).toBe(2);
        });

        it('clears everything', async () => {
            await store.clearAllData();

            expect(await store.getCourseCount()).toBe(0);
            expect((await store.search({ query: 'protocol' })).isEmpty()).toBe(true);
        });
    });
});
