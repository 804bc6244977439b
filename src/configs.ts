import { Regex, type SomeCompanionConfigField } from '@companion-module/base'

export type ModuleConfig = {
	ip: string
	port: number
	community: string
	walk: string
	maxRepetitions: number
	interval: number
	verbose: boolean
}

/** Matches an empty string or a comma separated list of dotted OIDs */
export const OID_LIST_REGEX = '/^$|^(0|1|2)(\\.(0|[1-9]\\d*))+(?:,\\s*(0|1|2)(\\.(0|[1-9]\\d*))+)*$/'

export default function (): SomeCompanionConfigField[] {
	return [
		{
			type: 'textinput',
			id: 'ip',
			label: 'Agent Address',
			width: 6,
			regex: Regex.IP,
			default: '127.0.0.1',
			minLength: 7,
		},
		{
			type: 'number',
			id: 'port',
			label: 'UDP Port',
			width: 6,
			min: 1,
			max: 65535,
			default: 161,
			description: 'Get, GetNext and GetBulk requests are sent to this port',
		},
		{
			type: 'textinput',
			id: 'community',
			width: 6,
			label: 'Community',
			default: 'public',
		},
		{
			type: 'textinput',
			id: 'walk',
			width: 6,
			label: 'Walk OIDs',
			default: '',
			description: 'Comma seperated list of OIDs to walk on init and on every poll.',
			regex: OID_LIST_REGEX,
			minLength: 0,
		},
		{
			type: 'number',
			id: 'maxRepetitions',
			label: 'Max Repetitions',
			width: 6,
			min: 1,
			max: 100,
			default: 10,
			description: 'Objects requested per GetBulk exchange while walking',
		},
		{
			type: 'number',
			id: 'interval',
			label: 'Poll Interval',
			width: 6,
			min: 0,
			max: 3600,
			default: 0,
			description: 'Seconds. Set to 0 to turn polling off.',
		},
		{
			type: 'checkbox',
			id: 'verbose',
			label: 'Verbose Logs',
			default: false,
			width: 6,
		},
	]
}
