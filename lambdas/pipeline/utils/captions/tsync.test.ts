import { describe, expect, it } from 'vitest'
import { sampleCues } from '../../mock-utils/captions'
import { generateTSync } from './tsync'

describe('generateTSync', () => {
  it('should bracket the cue starts with the clip start and end', () => {
    expect(generateTSync(sampleCues(), 60, 9000)).toEqual([
      { offset: 0, time: 0 },
      { offset: 0, time: 0 },
      { offset: 14, time: 2000 },
      { offset: 60, time: 9000 },
    ])
  })

  it('should only hold the end points when there are no cues', () => {
    expect(generateTSync([], 10, 500)).toEqual([
      { offset: 0, time: 0 },
      { offset: 10, time: 500 },
    ])
  })
})
