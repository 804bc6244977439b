import type { CompanionStaticUpgradeScript } from '@companion-module/base'
import type { ModuleConfig } from './configs.js'

export default [
	/*
	 * Place your upgrade scripts here
	 * Remember that once it has been added it cannot be removed!
	 */
] satisfies CompanionStaticUpgradeScript<ModuleConfig>[]
