/**
 * Domain Layer
 *
 * Contains the core logic of papersift:
 * - Entities: Core data structures
 * - Ports: Interfaces for external dependencies
 * - Services: Pure algorithms (tokenizer, index, BM25, expansion, filters)
 * - Use Cases: Request orchestration
 */

export * from "./entities";
export * from "./ports";
export * from "./services";
export * from "./usecases";
