import type { CompanionActionDefinitions, CompanionOptionValues } from '@companion-module/base'
import type SnmpPoller from './index.js'
import { MaxRepetitionsOption, OidDropdownOption, UpdateOption } from './options.js'
import { parseOid, type ObjectIdentifier } from './snmp/index.js'

export enum ActionId {
	GetOID = 'getOID',
	GetNextOID = 'getNextOID',
	WalkOID = 'walkOID',
}

type ActionContext = {
	parseVariablesInString(text: string): Promise<string>
}

/**
 * Resolve the OID option of an action, expanding any variables in it.
 *
 * @throws {Error} If the option does not hold a valid OID
 */
export const resolveOid = async (options: CompanionOptionValues, context: ActionContext): Promise<ObjectIdentifier> =>
	parseOid(await context.parseVariablesInString(String(options.oid ?? '')))

export default function (self: SnmpPoller): CompanionActionDefinitions {
	const oidOption = {
		...OidDropdownOption,
		choices: self.getOidChoices(),
		default: self.getOidChoices()[0]?.id ?? '',
	}
	return {
		[ActionId.GetOID]: {
			name: 'Get OID value',
			options: [oidOption, UpdateOption],
			callback: async ({ options }, context) => {
				await self.getOid(await resolveOid(options, context))
			},
			subscribe: async (action, context) => {
				if (action.options.update) self.addToPollGroup(action.id, await resolveOid(action.options, context))
				else self.removeFromPollGroup(action.id)
			},
			unsubscribe: (action) => {
				self.removeFromPollGroup(action.id)
			},
		},
		[ActionId.GetNextOID]: {
			name: 'Get next OID value',
			description: 'Stores the object that follows the OID in the agent MIB tree',
			options: [oidOption],
			callback: async ({ options }, context) => {
				await self.getNextOid(await resolveOid(options, context))
			},
		},
		[ActionId.WalkOID]: {
			name: 'Walk OID subtree',
			options: [oidOption, MaxRepetitionsOption],
			callback: async ({ options }, context) => {
				const maxRepetitions = Number(options.maxRepetitions ?? 0)
				await self.walk(await resolveOid(options, context), maxRepetitions > 0 ? maxRepetitions : undefined)
			},
		},
	}
}
