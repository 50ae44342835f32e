import { type Static, Type } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';
import { ConfigError } from '#patch/patchErrors';
import { envFlag, envNumber } from '#utils/env-var';

export const EngineConfigSchema = Type.Object({
	/** Reduce each matched block to the sub-ranges that actually changed */
	minimizeDiff: Type.Boolean(),
	/** Fall back to indentation-normalized matching when the exact pass misses */
	fuzzyMatch: Type.Boolean(),
	/** Minimum interval between accepted streaming updates */
	streamDebounceMs: Type.Number({ minimum: 0 }),
	/** Apply edits without asking for confirmation */
	autoApprove: Type.Boolean(),
});

export type EngineConfig = Static<typeof EngineConfigSchema>;

export const DEFAULT_ENGINE_CONFIG: Readonly<EngineConfig> = {
	minimizeDiff: true,
	fuzzyMatch: true,
	streamDebounceMs: 2,
	autoApprove: false,
};

/**
 * Builds the engine configuration from HUNKWISE_* environment variables.
 * @throws ConfigError listing every invalid value
 */
export function loadEngineConfig(env: Record<string, string | undefined> = process.env): EngineConfig {
	const candidate = {
		minimizeDiff: envFlag('HUNKWISE_MINIMIZE_DIFF', DEFAULT_ENGINE_CONFIG.minimizeDiff, env),
		fuzzyMatch: envFlag('HUNKWISE_FUZZY_MATCH', DEFAULT_ENGINE_CONFIG.fuzzyMatch, env),
		streamDebounceMs: envNumber('HUNKWISE_STREAM_DEBOUNCE_MS', DEFAULT_ENGINE_CONFIG.streamDebounceMs, env),
		autoApprove: envFlag('HUNKWISE_AUTO_APPROVE', DEFAULT_ENGINE_CONFIG.autoApprove, env),
	};

	if (!Value.Check(EngineConfigSchema, candidate)) {
		const issues = [...Value.Errors(EngineConfigSchema, candidate)].map((error) => `${error.path}: ${error.message}`);
		throw new ConfigError(issues);
	}
	return candidate;
}
