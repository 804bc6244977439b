import { InstanceStatus, type InstanceBase } from '@companion-module/base'
import { throttle } from 'es-toolkit'
import type { ModuleConfig } from './configs.js'

export type StatusMessage = string | { [key: string]: unknown } | null

export type Status = {
	status: InstanceStatus
	message: StatusMessage
}

type StatusTarget = Pick<InstanceBase<ModuleConfig>, 'updateStatus'>

/**
 * Throttles and deduplicates instance status updates.
 */
export class StatusManager {
	#parent: StatusTarget
	#currentStatus: Status
	#pendingStatus: Status | null = null
	#isDestroyed = false
	#throttledApply: (() => void) & { cancel: () => void; flush: () => void }

	constructor(
		parent: StatusTarget,
		initStatus: Status = { status: InstanceStatus.Disconnected, message: null },
		throttleTimeout = 2000,
	) {
		this.#parent = parent
		this.#currentStatus = initStatus
		this.#throttledApply = throttle(() => this.#apply(), throttleTimeout, { edges: ['trailing'] })
		this.#pendingStatus = initStatus
		this.#throttledApply()
	}

	#apply(): void {
		const next = this.#pendingStatus
		this.#pendingStatus = null
		if (next === null || this.#isDestroyed) return
		this.#currentStatus = next
		const message = typeof next.message === 'object' && next.message !== null ? JSON.stringify(next.message) : next.message
		this.#parent.updateStatus(next.status, message)
	}

	get status(): Status {
		return this.#currentStatus
	}

	get isDestroyed(): boolean {
		return this.#isDestroyed
	}

	/**
	 * Queue a status update. Only the latest update in each throttle window is
	 * applied, and an update equal to the last one is dropped.
	 */
	updateStatus(status: InstanceStatus, message: StatusMessage = null): void {
		if (this.#isDestroyed) {
			console.log(`StatusManager destroyed, ignoring status ${status}`)
			return
		}
		const latest = this.#pendingStatus ?? this.#currentStatus
		if (latest.status === status && JSON.stringify(latest.message) === JSON.stringify(message)) return
		this.#pendingStatus = { status, message }
		this.#throttledApply()
	}

	destroy(): void {
		this.#throttledApply.flush()
		this.#throttledApply.cancel()
		this.#isDestroyed = true
		this.#currentStatus = { status: InstanceStatus.Disconnected, message: 'Destroyed' }
		this.#parent.updateStatus(InstanceStatus.Disconnected, 'Destroyed')
	}
}
