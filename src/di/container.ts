import 'reflect-metadata'
import { Container } from 'inversify'
import { BatchConversionService, ConversionService } from '@/conversion'
import { IntellijToSublimeConverter, sublimePresets } from '@/converters/intellijToSublime'
import { IntellijToZedConverter, zedPresets } from '@/converters/intellijToZed'
import { SublimeToFleetConverter, fleetPresets } from '@/converters/sublimeToFleet'
import type { ThemeConverter } from '@/converters/types'
import { TOKENS } from './tokens'

export function createContainer(): Container {
  const container = new Container()

  container.bind(TOKENS.FleetPresets).toConstantValue(fleetPresets)
  container.bind(TOKENS.SublimePresets).toConstantValue(sublimePresets)
  container.bind(TOKENS.ZedPresets).toConstantValue(zedPresets)

  container.bind<ThemeConverter>(TOKENS.ThemeConverter).to(SublimeToFleetConverter).inSingletonScope()
  container.bind<ThemeConverter>(TOKENS.ThemeConverter).to(IntellijToSublimeConverter).inSingletonScope()
  container.bind<ThemeConverter>(TOKENS.ThemeConverter).to(IntellijToZedConverter).inSingletonScope()

  container.bind(ConversionService).toSelf().inSingletonScope()
  container.bind(BatchConversionService).toSelf().inSingletonScope()

  return container
}
