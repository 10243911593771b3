import { describe, expect, it } from 'vitest'
import { escapeHtml, formatCueTimestamp } from './formatting'

describe('formatCueTimestamp', () => {
  it('should format zero', () => {
    expect(formatCueTimestamp(0)).toBe('00:00.000')
  })

  it('should format seconds with milliseconds', () => {
    expect(formatCueTimestamp(1500)).toBe('00:01.500')
  })

  it('should format minutes', () => {
    expect(formatCueTimestamp(65250)).toBe('01:05.250')
  })

  it('should keep counting minutes past the hour', () => {
    expect(formatCueTimestamp(3723456)).toBe('62:03.456')
  })

  it('should handle edge case with 999 milliseconds', () => {
    expect(formatCueTimestamp(59999)).toBe('00:59.999')
  })
})

describe('escapeHtml', () => {
  it('should escape ampersands', () => {
    expect(escapeHtml('Tom & Jerry')).toBe('Tom &amp; Jerry')
  })

  it('should escape less-than signs', () => {
    expect(escapeHtml('a < b')).toBe('a &lt; b')
  })

  it('should escape greater-than signs', () => {
    expect(escapeHtml('a > b')).toBe('a &gt; b')
  })

  it('should escape multiple special characters', () => {
    expect(escapeHtml('<script>alert("&")</script>')).toBe(
      '&lt;script&gt;alert("&amp;")&lt;/script&gt;',
    )
  })

  it('should return plain text unchanged', () => {
    expect(escapeHtml('Hello world')).toBe('Hello world')
  })
})
