import {
	InstanceBase,
	InstanceStatus,
	type CompanionVariableValues,
	type DropdownChoice,
	type SomeCompanionConfigField,
} from '@companion-module/base'
import { debounce } from 'es-toolkit'
import GetConfigFields from './configs.js'
import type { ModuleConfig } from './configs.js'
import UpdateActions from './actions.js'
import UpgradeScripts from './upgrades.js'
import { StatusManager } from './status.js'
import {
	Client,
	DecodeError,
	Transport,
	TransportError,
	ValidationError,
	dialUdp,
	errorMessage,
	formatOid,
	formatValue,
	parseOid,
	type Binding,
	type Conn,
	type ObjectIdentifier,
} from './snmp/index.js'

export { UpgradeScripts }

/**
 * Name of the variable that holds the value of an OID, e.g. `oid_1_3_6_1_2_1_1_5_0`
 */
export const variableIdForOid = (oid: ObjectIdentifier): string => `oid_${oid.join('_')}`

export default class SnmpPoller extends InstanceBase<ModuleConfig> {
	public config!: ModuleConfig

	private statusManager = new StatusManager(this, { status: InstanceStatus.Connecting, message: 'Initialising' }, 2000)
	/** Latest binding of every OID seen, keyed by dotted OID */
	public oidValues: Map<string, Binding> = new Map()
	/** OIDs to Get on each poll, keyed by the id of the action that asked for them */
	private pollGroup: Map<string, ObjectIdentifier> = new Map()
	private walkRoots: ObjectIdentifier[] = []

	private pollTimer: NodeJS.Timeout | undefined

	private conn: Conn | null = null
	private client: Client | null = null

	constructor(internal: unknown) {
		super(internal)
	}

	public async init(config: ModuleConfig, _isFirstInit: boolean): Promise<void> {
		this.config = config
		this.updateActions()
		await this.initializeConnection()
	}

	public async configUpdated(config: ModuleConfig): Promise<void> {
		this.stopPolling()
		await this.disconnectAgent()
		this.config = config
		this.updateActions()
		await this.initializeConnection()
	}

	public async destroy(): Promise<void> {
		this.log('debug', `destroy ${this.id}:${this.label}`)
		this.statusManager.destroy()
		this.debouncedUpdateDefinitions.cancel()
		this.stopPolling()
		await this.disconnectAgent()
	}

	public getConfigFields(): SomeCompanionConfigField[] {
		return GetConfigFields()
	}

	/**
	 * Open the agent connection, then walk the configured subtrees and start polling
	 */
	private async initializeConnection(): Promise<void> {
		if (!(await this.connectAgent())) return

		this.walkRoots = []
		for (const text of this.config.walk.split(',').map((oid) => oid.trim())) {
			if (text === '') continue
			try {
				this.walkRoots.push(parseOid(text))
			} catch (err) {
				this.log('warn', `Walk OID skipped - ${errorMessage(err)}`)
			}
		}

		if (this.config.interval > 0) {
			await this.poll()
		} else {
			await this.walkAll()
		}
	}

	private async connectAgent(): Promise<boolean> {
		if (!this.config.ip) {
			this.log('warn', 'Please configure your instance')
			this.statusManager.updateStatus(InstanceStatus.BadConfig, 'Missing configuration')
			return false
		}
		if (!this.config.community) {
			this.log('warn', 'Please specify a community.')
			this.statusManager.updateStatus(InstanceStatus.BadConfig, 'Missing community')
			return false
		}

		this.statusManager.updateStatus(InstanceStatus.Connecting)
		try {
			this.conn = await dialUdp(this.config.ip, this.config.port)
		} catch (err) {
			this.log('error', `Could not open connection to ${this.config.ip}: ${errorMessage(err)}`)
			this.statusManager.updateStatus(InstanceStatus.ConnectionFailure, errorMessage(err))
			return false
		}
		this.client = new Client(new Transport(this.conn, this.config.community), {
			log: (level, message) => {
				if (this.config.verbose) this.log(level, message)
			},
		})
		return true
	}

	private async disconnectAgent(): Promise<void> {
		this.client?.clear()
		this.client = null
		const conn = this.conn
		this.conn = null
		if (conn) await conn.close()
	}

	private stopPolling(): void {
		if (this.pollTimer) {
			clearTimeout(this.pollTimer)
			delete this.pollTimer
		}
	}

	/**
	 * Run one exchange against the agent, storing every binding it returns and
	 * reflecting the outcome in the instance status.
	 *
	 * @throws The error of the exchange, after it has been logged
	 */
	private async exchange(what: string, run: (client: Client) => Promise<Binding[]>): Promise<Binding[]> {
		const client = this.client
		if (client === null) throw new Error('SNMP connection not initialized')
		try {
			const bindings = await run(client)
			bindings.forEach((binding) => this.handleBinding(binding))
			this.statusManager.updateStatus(InstanceStatus.Ok)
			return bindings
		} catch (err) {
			this.log('warn', `${what} failed - ${errorMessage(err)}`)
			// the status belongs to the current connection
			if (this.client !== client) throw err
			if (err instanceof TransportError) {
				this.statusManager.updateStatus(InstanceStatus.ConnectionFailure, err.message)
			} else if (err instanceof ValidationError || err instanceof DecodeError) {
				this.statusManager.updateStatus(InstanceStatus.UnknownWarning, err.message)
			}
			throw err
		}
	}

	/**
	 * Store a binding and publish its value
	 */
	private handleBinding(binding: Binding): void {
		const key = formatOid(binding.oid)
		const isNew = !this.oidValues.has(key)
		this.oidValues.set(key, binding)
		if (isNew) this.debouncedUpdateDefinitions()
		const values: CompanionVariableValues = { [variableIdForOid(binding.oid)]: formatValue(binding.value) }
		this.setVariableValues(values)
	}

	/**
	 * Get OID values from the agent
	 *
	 * @throws If the exchange fails or the response is invalid
	 */
	public async getOid(...oids: ObjectIdentifier[]): Promise<Binding[]> {
		if (oids.length === 0) return []
		return this.exchange(`Get ${oids.map(formatOid).join(', ')}`, async (client) => client.get(...oids))
	}

	/**
	 * Get the objects following each OID in the agent's MIB tree
	 *
	 * @throws If the exchange fails or the response is invalid
	 */
	public async getNextOid(...oids: ObjectIdentifier[]): Promise<Binding[]> {
		if (oids.length === 0) return []
		return this.exchange(`GetNext ${oids.map(formatOid).join(', ')}`, async (client) => client.getNext(...oids))
	}

	/**
	 * Walk the MIB subtree under root with GetBulk
	 *
	 * @param maxRepetitions - Defaults to the connection's Max Repetitions setting
	 * @throws If an exchange fails or a response is invalid
	 */
	public async walk(root: ObjectIdentifier, maxRepetitions = this.config.maxRepetitions): Promise<Binding[]> {
		this.log('info', `Walking ${formatOid(root)}...`)
		const bindings = await this.exchange(`Walk ${formatOid(root)}`, async (client) =>
			client.bulkWalk(root, maxRepetitions),
		)
		this.log('info', `Walk of ${formatOid(root)} complete, ${bindings.length} OID(s) found`)
		return bindings
	}

	/** Walk every configured subtree, each failure already logged by the walk */
	private async walkAll(): Promise<void> {
		for (const root of this.walkRoots) {
			await this.walk(root).catch(() => undefined)
		}
	}

	public addToPollGroup(actionId: string, oid: ObjectIdentifier): void {
		this.pollGroup.set(actionId, oid)
	}

	public removeFromPollGroup(actionId: string): void {
		this.pollGroup.delete(actionId)
	}

	/** Distinct OIDs currently in the poll group */
	public get oidsToPoll(): ObjectIdentifier[] {
		const unique = new Map<string, ObjectIdentifier>()
		this.pollGroup.forEach((oid) => unique.set(formatOid(oid), oid))
		return [...unique.values()]
	}

	private async poll(): Promise<void> {
		const client = this.client
		await this.walkAll()
		const oids = this.oidsToPoll
		if (oids.length > 0 && this.client === client) await this.getOid(...oids).catch(() => undefined)
		// a reconnect while this poll ran has started a poll loop of its own
		if (this.config.interval > 0 && client !== null && this.client === client) {
			this.pollTimer = setTimeout(() => {
				this.poll().catch((err) => this.log('error', `Poll failed - ${errorMessage(err)}`))
			}, this.config.interval * 1000)
		}
	}

	/**
	 * Returns a list of dropdown choices from the cached OID values map,
	 * one entry per OID key.
	 */
	public getOidChoices(): DropdownChoice[] {
		return Array.from(this.oidValues.entries()).map(([oid, binding]) => ({
			id: oid,
			label: `${oid} (${binding.value.type})`,
		}))
	}

	private updateActions(): void {
		this.setActionDefinitions(UpdateActions(this))
	}

	private updateVariableDefinitions(): void {
		this.setVariableDefinitions(
			Array.from(this.oidValues.values()).map((binding) => ({
				variableId: variableIdForOid(binding.oid),
				name: `OID ${formatOid(binding.oid)}`,
			})),
		)
	}

	/**
	 * Debounced function that updates action and variable definitions.
	 */
	private debouncedUpdateDefinitions = debounce(() => {
		this.updateActions()
		this.updateVariableDefinitions()
	}, 1000)
}
