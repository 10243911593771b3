import { logger } from '../lib/lambda-common'
import type { EntityType, NamedEntity } from '../types'
import { EntityConfidence } from '../types'
import { fail, ok, type Result } from '../utils/result'

interface NerToken {
  /** Token as it appears in the transcript */
  text: string
  type: EntityType
}

interface OpenEntity {
  words: string[]
  startOffset: number
  type: EntityType
}

const BRACKET_TOKENS = new Map([
  ['-LSB-', '['],
  ['-RSB-', ']'],
  ['-LRB-', '('],
  ['-RRB-', ')'],
  ['-LCB-', '{'],
  ['-RCB-', '}'],
])

const TAG_TYPES = new Map<string, EntityType>([
  ['PERSON', 'Person'],
  ['LOCATION', 'Loc'],
  ['ORGANIZATION', 'Org'],
])

/**
 * Map a token written by the tagger back to the text found in the transcript.
 * Punctuation other than commas and square brackets is dropped, since the
 * tagger repeats and invents it.
 *
 * @returns The transcript form, or an empty string for a token to skip
 */
export function toSourceForm(token: string): string {
  const bracket = BRACKET_TOKENS.get(token)
  if (bracket !== undefined) return bracket
  if (token === ',') return ','

  let text = token
  for (const [placeholder, character] of BRACKET_TOKENS) {
    text = text.split(placeholder).join(character)
  }

  if (/[\p{L}\p{N}]/u.test(text)) {
    const units = text.split('')
    if (units.some((c) => c.charCodeAt(0) > 255)) {
      logger.warn('Replacing non-ASCII characters in NER token', { token })
      return units.map((c) => (c.charCodeAt(0) > 255 ? ' ' : c)).join('')
    }
    return text
  }

  // The tagger may glue brackets to other punctuation, as in ":]"
  if (text.includes('[')) return '['
  if (text.includes(']')) return ']'
  return ''
}

/**
 * Parse `text<TAB>tag` lines, skipping malformed lines and tokens with no
 * transcript form.
 */
function parseTokens(tokenStream: string): NerToken[] {
  const tokens: NerToken[] = []

  for (const line of tokenStream.split(/\r?\n/)) {
    const fields = line.split('\t')
    if (fields.length !== 2 || fields[0].length === 0) continue

    const text = toSourceForm(fields[0])
    if (text.length === 0) continue

    tokens.push({ text, type: TAG_TYPES.get(fields[1]) ?? 'Unset' })
  }

  return tokens
}

function scan(tokens: NerToken[], transcript: string): Result<NamedEntity[]> {
  const entities: NamedEntity[] = []
  let offset = 0
  let i = 0

  const locate = (token: NerToken): Result<number> => {
    const found = transcript.indexOf(token.text, offset)
    return found < 0
      ? fail({
          kind: 'ner-desync',
          message: `Transcript has no '${token.text}' at or after offset ${offset}`,
          token: token.text,
          offset,
        })
      : ok(found)
  }

  const close = (entity: OpenEntity) => {
    if (entity.type === 'Unset') return
    entities.push({
      text: entity.words.join(' '),
      contextualizedText: transcript.substring(entity.startOffset, offset),
      startOffset: entity.startOffset,
      length: offset - entity.startOffset,
      type: entity.type,
      confidence: EntityConfidence.None,
    })
  }

  while (i < tokens.length) {
    const first = tokens[i]
    const start = locate(first)
    if (!start.ok) return start

    offset = start.value + first.text.length
    i++

    // Square brackets may hold a prefix of the entity that follows
    if (first.type === 'Unset' && first.text !== '[') continue

    const entity: OpenEntity = {
      words: [first.text],
      startOffset: start.value,
      type: first.type,
    }
    let inBrackets = first.text === '['
    let consideringPrefix = inBrackets
    let depth = 0
    let filling = true

    while (filling) {
      if (i >= tokens.length) {
        if (inBrackets) {
          return fail({
            kind: 'bracket-mismatch',
            message: `Square brackets opened at offset ${entity.startOffset} are never closed`,
          })
        }
        close(entity)
        filling = false
        continue
      }

      const token = tokens[i]
      const found = locate(token)
      if (!found.ok) return found
      const at = found.value

      if (inBrackets) {
        if (token.text === '[') {
          depth++
        } else if (token.text === ']') {
          if (depth > 0) {
            depth--
          } else {
            inBrackets = false
          }
        } else if (
          consideringPrefix &&
          entity.type === 'Unset' &&
          token.type !== 'Unset'
        ) {
          entity.type = token.type
        }
        entity.words.push(token.text)
        offset = at + token.text.length
        i++
        continue
      }

      // A paragraph break always ends an entity
      if (
        transcript
          .substring(entity.startOffset, at + token.text.length)
          .includes('\n\n')
      ) {
        close(entity)
        filling = false
        continue
      }

      if (token.text === '[') {
        inBrackets = true
        depth = 0
        entity.words.push(token.text)
        offset = at + 1
        i++
        continue
      }

      if (consideringPrefix) {
        consideringPrefix = false

        if (token.type === 'Unset' && entity.type === 'Unset') {
          // An untyped bracket followed by an untyped word is no entity
          offset = at + token.text.length
          i++
          filling = false
          continue
        }
        if (token.type !== 'Unset') entity.type = token.type
      }

      if (token.type !== entity.type) {
        close(entity)
        filling = false
      } else {
        entity.words.push(token.text)
        offset = at + token.text.length
        i++
      }
    }
  }

  return ok(entities)
}

/**
 * Turn Stanford NER token output into named entities with transcript offsets.
 *
 * Tokens are matched against the transcript in order. Runs of tokens sharing
 * a tag become one entity, and a square-bracketed annotation is folded into
 * the entity it precedes or follows. A blank line in the transcript always
 * ends an entity.
 *
 * @param tokenStream - One `text<TAB>tag` token per line
 * @param transcript - The text the tagger was run on
 * @returns Typed entities in transcript order, or a `ner-desync` or
 * `bracket-mismatch` failure
 */
export function polishStanfordNer(
  tokenStream: string,
  transcript: string,
): Result<NamedEntity[]> {
  const tokens = parseTokens(tokenStream)
  const result = scan(tokens, transcript)

  if (!result.ok) {
    logger.error('Unable to line up NER output with transcript', {
      error: result.error,
    })
    return result
  }

  logger.info('Polished NER output', {
    tokens: tokens.length,
    entities: result.value.length,
  })
  return result
}
