export * from './cues'
export { generateDiagnostic } from './diagnostic'
export { escapeHtml, formatCueTimestamp } from './formatting'
export { generateTSync } from './tsync'
export type { GeneratorOptions } from './types'
export { generateVtt } from './vtt'
