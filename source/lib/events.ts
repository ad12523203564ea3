import {EventEmitter} from 'node:events';

/**
 * Type-safe event emitter.
 *
 * Usage:
 * ```typescript
 * class Orchestrator extends TypedEmitter<OrchestratorEvents> {
 *   finish(report: IngestionReport) {
 *     this.emit('run-complete', report);
 *   }
 * }
 * ```
 */
export class TypedEmitter<
	T extends {[K in keyof T]: unknown[]},
> extends EventEmitter {
	override emit<K extends keyof T & string>(event: K, ...args: T[K]): boolean {
		return super.emit(event, ...args);
	}

	override on<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.on(event, listener as (...args: unknown[]) => void);
	}

	override once<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.once(event, listener as (...args: unknown[]) => void);
	}

	override off<K extends keyof T & string>(
		event: K,
		listener: (...args: T[K]) => void,
	): this {
		return super.off(event, listener as (...args: unknown[]) => void);
	}
}
