/**
 * One SEARCH/REPLACE edit as produced by the block parser.
 * Lines are raw text without their trailing newline.
 */
export interface EditBlock {
	oldLines: string[];
	newLines: string[];
	/** True only for the last block of a stream that is still being generated */
	isPartial: boolean;
	/** 1-based line to insert before when oldLines is empty (insert/create) */
	anchorLine?: number;
}

/** Immutable lines of a file, captured once per locate-and-apply pass */
export type FileSnapshot = readonly string[];

export interface MatchedBlock extends EditBlock {
	/** 1-based inclusive, in snapshot coordinates */
	startLine: number;
	/** startLine - 1 when oldLines is empty */
	endLine: number;
	/** Whether the match needed indentation normalization */
	fuzzy: boolean;
}

export interface Hunk {
	oldLines: string[];
	newLines: string[];
	/** Original-file coordinates */
	startLine: number;
	endLine: number;
	/** Post-apply coordinates, filled in by the offset coordinator */
	newStartLine: number;
	newEndLine: number;
}

export type HunkStatus = 'pending' | 'committed' | 'rejected';

export type SessionStatus = 'open' | 'resolving' | 'closed';

/** (startLine, endLine, len(oldLines), len(newLines)) */
export type StabilityKey = readonly [number, number, number, number];

export type HunkKind = 'stable' | 'unstable';

export interface ClassifiedHunk {
	hunk: Hunk;
	kind: HunkKind;
}

/**
 * A replacement the caller must perform against its own storage.
 * endLine < startLine means a pure insertion before startLine.
 */
export interface RangeReplacement {
	path: string;
	startLine: number;
	endLine: number;
	lines: string[];
}
