import { AsyncLocalStorage } from 'node:async_hooks'
import { EventEmitter } from 'node:events'
import { MessageChannel } from 'node:worker_threads'

/**
 * A warning as forwarded to the compilation session.
 */
export interface WarningEvent {
	readonly file: string
	readonly line: number
	readonly text: string
}

export interface WarningNotification extends WarningEvent {
	readonly type: 'warning'
}

/**
 * The component tracking a compilation's warnings.
 *
 * `postMessage` is one-way: implementations must not block the caller, and the
 * caller never waits for delivery.
 */
export interface CompilationSession {
	postMessage(message: WarningNotification): void
	registerWarning(): void
}

const sessionStorage = new AsyncLocalStorage<CompilationSession>()

/**
 * Run `fn` with `session` registered for everything it reports, including
 * asynchronous continuations.
 */
export function withCompilationSession<T>(session: CompilationSession, fn: () => T): T {
	return sessionStorage.run(session, fn)
}

/**
 * The session registered for the current compilation, if any.
 */
export function currentSession(): CompilationSession | undefined {
	return sessionStorage.getStore()
}

export function isWarningNotification(value: unknown): value is WarningNotification {
	if (typeof value !== 'object' || value === null) return false
	return (
		'type' in value &&
		value.type === 'warning' &&
		'file' in value &&
		typeof value.file === 'string' &&
		'line' in value &&
		typeof value.line === 'number' &&
		'text' in value &&
		typeof value.text === 'string'
	)
}

/**
 * Session that accumulates warnings for one compilation.
 *
 * Notifications travel over a MessageChannel, so they arrive asynchronously
 * and in order; each one is also emitted as a `warning` event. The receiving
 * port only holds the event loop open while notifications are in flight, so
 * an unclosed collector does not keep the process alive. Call `close()` when
 * the compilation is done.
 */
export class WarningCollector extends EventEmitter implements CompilationSession {
	private readonly channel = new MessageChannel()
	private readonly received: WarningEvent[] = []
	private registered = 0
	private inFlight = 0
	private closed = false

	constructor() {
		super()
		this.channel.port1.on('message', (message: unknown) => {
			this.inFlight--
			if (this.inFlight === 0) this.channel.port1.unref()
			if (!isWarningNotification(message)) return
			const event: WarningEvent = { file: message.file, line: message.line, text: message.text }
			this.received.push(event)
			this.emit('warning', event)
		})
		this.channel.port1.unref()
	}

	postMessage(message: WarningNotification): void {
		if (this.closed) return
		this.inFlight++
		this.channel.port1.ref()
		this.channel.port2.postMessage(message)
	}

	registerWarning(): void {
		this.registered++
	}

	/** Warnings delivered so far */
	get warnings(): readonly WarningEvent[] {
		return this.received
	}

	/** Number of registerWarning calls */
	get warningCount(): number {
		return this.registered
	}

	/** Whether undelivered notifications are holding the event loop open */
	get pending(): boolean {
		return this.inFlight > 0
	}

	close(): void {
		this.closed = true
		this.inFlight = 0
		this.channel.port1.close()
		this.channel.port2.close()
	}
}
