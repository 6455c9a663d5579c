/**
 * PreferencesContext - Preact context provider for the preference coordinator.
 *
 * Renders with the defaults right away, and with the strategy the page's server-rendered session
 * markers suggest. Switches to the resolved preferences once the session probe and the first read
 * finish. Changes made in other tabs re-render subscribers.
 */

import {
	createPreferenceCoordinator,
	type KnownPreferences,
	type PreferenceCoordinator,
	type PreferenceKey,
	type PreferenceMap,
	type Strategy,
	sanitizePreferences,
	withDefaults,
} from "../services/preferences";
import { getLog } from "../util/Logger";
import { type ComponentChildren, createContext, type JSX } from "preact";
import { useCallback, useContext, useEffect, useMemo, useRef, useState } from "preact/hooks";

const log = getLog(import.meta);

interface PreferencesContextType {
	/** The coordinator instance */
	coordinator: PreferenceCoordinator;
	/** Current preferences; the defaults until the first read finishes */
	preferences: PreferenceMap;
	/** Strategy in effect; until the session probe finishes, the one the page markers suggest */
	strategy: Strategy;
	/** Whether the session probe and the first read finished */
	isReady: boolean;
	/** Updates one preference optimistically, then persists it */
	setPreference<K extends PreferenceKey>(key: K, value: KnownPreferences[K]): Promise<void>;
}

const PreferencesContext = createContext<PreferencesContextType | undefined>(undefined);

export interface PreferencesProviderProps {
	children: ComponentChildren;
	/**
	 * Coordinator to use. When omitted, the provider creates one from the environment
	 * configuration and destroys it on unmount; an injected coordinator stays with its owner.
	 */
	coordinator?: PreferenceCoordinator;
}

/**
 * Provider component that owns preference state for its children.
 *
 * @example
 * ```tsx
 * <PreferencesProvider>
 *   <Inbox />
 * </PreferencesProvider>
 * ```
 */
export function PreferencesProvider({ children, coordinator: injected }: PreferencesProviderProps): JSX.Element {
	// Create coordinator instance once
	const coordinatorRef = useRef<PreferenceCoordinator | null>(null);
	if (!coordinatorRef.current) {
		coordinatorRef.current = injected ?? createPreferenceCoordinator();
	}
	const coordinator = coordinatorRef.current;
	const ownsCoordinator = injected === undefined;

	const [preferences, setPreferences] = useState<PreferenceMap>(() => withDefaults({}));
	const [strategy, setStrategy] = useState<Strategy>(() => coordinator.getExpectedStrategy());
	const [isReady, setIsReady] = useState(false);
	const activeRef = useRef(false);
	// Bumped by every setPreference; a read started before the latest write must not overwrite it
	const writeGeneration = useRef(0);

	useEffect(() => {
		activeRef.current = true;
		const unsubscribe = coordinator.onChange(next => {
			if (activeRef.current) {
				setPreferences(next);
			}
		});

		async function load(): Promise<void> {
			const generation = writeGeneration.current;
			const resolved = await coordinator.initialize();
			const loaded = await coordinator.getAll();
			if (!activeRef.current) {
				return;
			}
			setStrategy(resolved);
			if (generation === writeGeneration.current) {
				setPreferences(loaded);
			}
			setIsReady(true);
		}
		load().catch(error => log.error(error, "Failed to load preferences"));

		return () => {
			activeRef.current = false;
			unsubscribe();
			if (ownsCoordinator) {
				coordinator.destroy();
			}
		};
	}, [coordinator, ownsCoordinator]);

	const setPreference = useCallback(
		async <K extends PreferenceKey>(key: K, value: KnownPreferences[K]): Promise<void> => {
			writeGeneration.current += 1;
			const generation = writeGeneration.current;
			setPreferences(current => sanitizePreferences({ ...current, [key]: value }));

			// A write must not run under the "local" placeholder strategy of an unfinished probe
			await coordinator.initialize();
			await coordinator.set(key, value);

			if (generation === writeGeneration.current) {
				const stored = await coordinator.getAll();
				if (activeRef.current && generation === writeGeneration.current) {
					setPreferences(stored);
				}
			}
		},
		[coordinator],
	);

	const value: PreferencesContextType = useMemo(
		() => ({ coordinator, preferences, strategy, isReady, setPreference }),
		[coordinator, preferences, strategy, isReady, setPreference],
	);

	return <PreferencesContext.Provider value={value}>{children}</PreferencesContext.Provider>;
}

/**
 * Hook to access preference state.
 *
 * @throws Error if used outside of PreferencesProvider
 */
export function usePreferences(): PreferencesContextType {
	const context = useContext(PreferencesContext);
	if (context === undefined) {
		throw new Error("usePreferences must be used within a PreferencesProvider");
	}
	return context;
}
