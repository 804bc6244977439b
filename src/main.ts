import { runEntrypoint } from '@companion-module/base'
import SnmpPoller, { UpgradeScripts } from './index.js'

runEntrypoint(SnmpPoller, UpgradeScripts)
