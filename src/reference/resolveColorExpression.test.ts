import { describe, it, expect } from 'vitest'
import { InvalidColorError } from '@/color'
import { createVariableTable } from './createVariableTable'
import { CycleDetectedError, UnresolvedReferenceError } from './errors'
import { assertTableResolvable, resolveColor, resolveColorExpression, resolveVariable } from './resolveColorExpression'

describe('resolveColorExpression', () => {
  const table = createVariableTable({
    bg: '#101010',
    base: 'var(bg)',
    surface: 'var(base)',
    blend: 'color(var(bg) alpha(0.5))',
  })

  it('should return literals unchanged', () => {
    expect(resolveColorExpression('#abcdef', table)).toBe('#abcdef')
  })

  it('should follow a single reference', () => {
    expect(resolveColorExpression('var(bg)', table)).toBe('#101010')
  })

  it('should follow nested references', () => {
    expect(resolveColorExpression('var(surface)', table)).toBe('#101010')
  })

  it('should stop at non-reference literals', () => {
    expect(resolveColorExpression('var(blend)', table)).toBe('color(var(bg) alpha(0.5))')
  })

  it('should fail on a missing variable', () => {
    expect(() => resolveColorExpression('var(missing)', table)).toThrow(UnresolvedReferenceError)
  })

  it('should report the chain that led to a missing variable', () => {
    const broken = createVariableTable({ a: 'var(b)', b: 'var(c)' })
    expect(() => resolveColorExpression('var(a)', broken)).toThrow("unresolved reference 'c' (via a -> b)")
  })

  it('should detect two-variable cycles', () => {
    const cyclic = createVariableTable({ a: 'var(b)', b: 'var(a)' })
    expect(() => resolveVariable('a', cyclic)).toThrow(CycleDetectedError)
  })

  it('should detect self references', () => {
    const cyclic = createVariableTable({ a: 'var(a)' })
    expect(() => resolveVariable('a', cyclic, 4)).toThrow('reference chain exceeds depth budget: a -> a -> a -> a -> a')
  })

  it('should allow chains as long as the budget', () => {
    const chained = createVariableTable({ a: 'var(b)', b: 'var(c)', c: '#FFFFFF' })
    expect(resolveVariable('a', chained, 3)).toBe('#FFFFFF')
    expect(() => resolveVariable('a', chained, 2)).toThrow(CycleDetectedError)
  })
})

describe('resolveColor', () => {
  it('should normalize the resolved literal', () => {
    const table = createVariableTable({ fg: 'eee' })
    expect(resolveColor('var(fg)', table)).toBe('#EEEEEE')
  })

  it('should fail on a resolved literal that is not a color', () => {
    const table = createVariableTable({ fg: 'white' })
    expect(() => resolveColor('var(fg)', table)).toThrow(InvalidColorError)
  })
})

describe('assertTableResolvable', () => {
  it('should accept tables whose variables all reach a literal', () => {
    const table = createVariableTable({ bg: '#101010', base: 'var(bg)', blend: 'color(var(bg) alpha(0.5))' })
    expect(() => assertTableResolvable(table)).not.toThrow()
  })

  it('should fail on a dangling variable nothing refers to', () => {
    const table = createVariableTable({ bg: '#101010', accent: 'var(nowhere)' })
    expect(() => assertTableResolvable(table)).toThrow("unresolved reference 'nowhere' (via accent)")
  })

  it('should fail on a cycle nothing refers to', () => {
    const table = createVariableTable({ bg: '#101010', a: 'var(b)', b: 'var(a)' })
    expect(() => assertTableResolvable(table, 8)).toThrow(CycleDetectedError)
  })
})
