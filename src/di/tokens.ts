export const TOKENS = {
  ThemeConverter: Symbol.for('ThemeConverter'),
  FleetPresets: Symbol.for('FleetPresets'),
  SublimePresets: Symbol.for('SublimePresets'),
  ZedPresets: Symbol.for('ZedPresets'),
} as const
