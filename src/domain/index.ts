/**
 * Domain Layer
 *
 * Contains the core logic of the cast analyzer:
 * - Entities: Core data structures
 * - Ports: Interfaces for external dependencies
 * - Services: Pure algorithms
 * - Use Cases: Scan-phase orchestration
 */

export * from "./entities";
export * from "./ports";
export * from "./services";
export * from "./usecases";
