export { DEFAULT_ENGINE_CONFIG, type EngineConfig, EngineConfigSchema, loadEngineConfig } from '#config/engineConfig';
export { FileSystemLineStore } from '#files/fileSystemLineStore';
export { InMemoryLineStore, type LineStore, executeReplacements } from '#files/lineStore';
export { BlockLocator, type BlockLocatorOptions } from '#patch/blockLocator';
export { type BlockMarkers, DEFAULT_MARKERS } from '#patch/constants';
export { parseEditBlocks, type ParseOptions } from '#patch/editBlockParser';
export { EditOperation, type EditOperationDeps, type EditResult, USER_DECLINED } from '#patch/editOperation';
export { type EditSource, type ResolvedEdit, resolveEditSource } from '#patch/editSource';
export { minimizeBlock } from '#patch/hunkMinimizer';
export { applyHunks, locateBlocks, planHunks, type PlanOptions } from '#patch/hunkPlanner';
export { repairMarkup, type RepairResult } from '#patch/markupRepair';
export { coordinateOffsets, totalDelta } from '#patch/offsetCoordinator';
export * from '#patch/patchErrors';
export { ApplySession } from '#patch/state/applySession';
export { SessionStore } from '#patch/state/sessionStore';
export { StreamStabilizer, type StabilizerResult, stabilityKey } from '#patch/streamStabilizer';
export { type RenderHunk, StreamingEdit, type StreamingUpdate } from '#patch/streamingEdit';
export { looksLikeUnifiedDiff, unifiedDiffToMarkup } from '#patch/unifiedDiff';
export type * from '#shared/patch/patch.model';
export * from '#shared/patch/patch.schema';
