import { getLog } from "../../util/Logger";
import type { PreferenceResult } from "./PreferenceResult";

const log = getLog(import.meta);

/**
 * One source in a fallback chain. Sources are tried in order until one succeeds.
 */
export interface FallbackStep<T, N extends string = string> {
	name: N;
	run(): PreferenceResult<T> | Promise<PreferenceResult<T>>;
}

/**
 * The last source of a chain. It has no failure case.
 */
export interface FinalStep<T, N extends string = string> {
	name: N;
	run(): T;
}

export interface FallbackResolution<T, N extends string> {
	value: T;
	/** Name of the step that produced the value */
	source: N;
}

/**
 * Runs the steps in order and resolves with the first success. Failed steps, and steps that throw,
 * are logged at warn before moving on; the final step runs when every other step failed.
 */
export async function resolveFallbackChain<T, N extends string>(
	steps: ReadonlyArray<FallbackStep<T, N>>,
	finalStep: FinalStep<T, N>,
): Promise<FallbackResolution<T, N>> {
	for (const step of steps) {
		try {
			const result = await step.run();
			if (result.success) {
				log.debug("Resolved preferences from %s", step.name);
				return { value: result.value, source: step.name };
			}
			log.warn(
				{ kind: result.error.kind, status: result.error.status },
				"Preference source %s failed: %s",
				step.name,
				result.error.message,
			);
		} catch (error) {
			log.warn(error, "Preference source %s threw", step.name);
		}
	}
	log.debug("Resolved preferences from %s", finalStep.name);
	return { value: finalStep.run(), source: finalStep.name };
}
