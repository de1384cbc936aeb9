export enum ThemePolarity {
  Light = 'light',
  Dark = 'dark',
}

export type PolarityPresets<T> = Readonly<Record<ThemePolarity, T>>
