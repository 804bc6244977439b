import type {
	CompanionInputFieldCheckbox,
	CompanionInputFieldDropdown,
	CompanionInputFieldNumber,
} from '@companion-module/base'

export const OidDropdownOption: CompanionInputFieldDropdown = {
	type: 'dropdown',
	id: 'oid',
	label: 'OID',
	choices: [],
	default: '',
	regex: '/^\\.?\\d+(?:\\.\\d+)+$/',
	allowCustom: true,
}

export const UpdateOption: CompanionInputFieldCheckbox = {
	type: 'checkbox',
	label: 'Update',
	id: 'update',
	tooltip: 'Update each poll interval',
	default: false,
}

export const MaxRepetitionsOption: CompanionInputFieldNumber = {
	type: 'number',
	label: 'Max Repetitions',
	id: 'maxRepetitions',
	tooltip: 'Objects requested per GetBulk exchange. 0 uses the connection setting.',
	min: 0,
	max: 100,
	default: 0,
	step: 1,
}
