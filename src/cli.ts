import 'reflect-metadata'
import { createContainer } from '@/di/container'
import { createProgram } from '@/program'

await createProgram(createContainer()).parseAsync(process.argv)
