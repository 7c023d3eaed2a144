import { describe, it, expect } from 'vitest'
import { createWorkItemId, formatIdTimestamp, isPlainObject, slugify } from '../helpers.js'

describe('isPlainObject', () => {
  it('accepts object literals and null-prototype objects', () => {
    expect(isPlainObject({ a: 1 })).toBe(true)
    expect(isPlainObject(Object.create(null))).toBe(true)
  })

  it('rejects arrays, dates and primitives', () => {
    expect(isPlainObject([])).toBe(false)
    expect(isPlainObject(new Date())).toBe(false)
    expect(isPlainObject(null)).toBe(false)
    expect(isPlainObject('x')).toBe(false)
  })
})

describe('slugify', () => {
  it('lower-cases and dashes words', () => {
    expect(slugify('Fix Null Handling!')).toBe('fix-null-handling')
  })

  it('drops accents', () => {
    expect(slugify('Café résumé')).toBe('cafe-resume')
  })

  it('falls back to "item" when nothing is left', () => {
    expect(slugify('!!!')).toBe('item')
  })

  it('truncates without leaving a trailing dash', () => {
    expect(slugify('a'.repeat(60))).toBe('a'.repeat(48))
    expect(slugify(`${'x'.repeat(47)} yz`)).toBe('x'.repeat(47))
  })
})

describe('createWorkItemId', () => {
  const now = new Date('2024-03-05T07:08:09.123Z')

  it('formats the UTC timestamp', () => {
    expect(formatIdTimestamp(now)).toBe('20240305-070809')
  })

  it('combines timestamp and slug', () => {
    expect(createWorkItemId('Fix null', now, () => false)).toBe('20240305-070809-fix-null')
  })

  it('appends the first free numeric suffix', () => {
    const taken = new Set(['20240305-070809-fix-null', '20240305-070809-fix-null-2'])
    expect(createWorkItemId('fix-null', now, (id) => taken.has(id))).toBe('20240305-070809-fix-null-3')
  })
})
