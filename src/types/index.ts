// Core types for course-rag
export * from "./course.js";
export * from "./tool.js";
export * from "./model.js";
