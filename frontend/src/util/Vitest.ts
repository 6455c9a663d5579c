import { vi } from "vitest";

// Allow unlimited event listeners in test environment to prevent warnings
// when this setup file runs for multiple test suites
process.setMaxListeners(0);

global.console.error = vi.fn();
global.console.warn = vi.fn();

global.fetch = vi.fn();

class MemoryStorage implements Storage {
	private store = new Map<string, string>();

	get length(): number {
		return this.store.size;
	}

	clear(): void {
		this.store.clear();
	}

	getItem(key: string): string | null {
		return this.store.get(key) ?? null;
	}

	key(index: number): string | null {
		const keys = Array.from(this.store.keys());
		return keys[index] ?? null;
	}

	removeItem(key: string): void {
		this.store.delete(key);
	}

	setItem(key: string, value: string): void {
		this.store.set(key, value);
	}
}

function hasStorageShape(value: unknown): boolean {
	return (
		typeof value === "object" &&
		value !== null &&
		typeof Reflect.get(value, "getItem") === "function" &&
		typeof Reflect.get(value, "setItem") === "function" &&
		typeof Reflect.get(value, "removeItem") === "function" &&
		typeof Reflect.get(value, "clear") === "function"
	);
}

function ensureWebStorage(name: "localStorage" | "sessionStorage"): void {
	if (hasStorageShape(Reflect.get(globalThis, name))) {
		return;
	}

	const fallback = new MemoryStorage();
	Object.defineProperty(globalThis, name, { configurable: true, writable: true, value: fallback });
	if (typeof window !== "undefined" && window !== globalThis) {
		Object.defineProperty(window, name, { configurable: true, writable: true, value: fallback });
	}
}

// Some Node environments expose a non-standard localStorage placeholder without Storage methods.
// Ensure tests always run with a complete in-memory Web Storage implementation.
ensureWebStorage("localStorage");
ensureWebStorage("sessionStorage");
