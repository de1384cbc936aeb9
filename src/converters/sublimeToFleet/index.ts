export { SublimeToFleetConverter } from './SublimeToFleetConverter'
export { fleetPresets, fleetTables } from './tables'
export type { FleetPreset } from './tables'
export type { FleetTextAttribute, FleetTheme } from './types'
