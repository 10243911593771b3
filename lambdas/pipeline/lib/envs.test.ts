process.env.EXAMPLE_KEY_1 = 'test'

import { assert, test } from 'vitest'
import envs from './envs'

test('envs retrieves environment variables if available', () => {
  assert.equal(envs.EXAMPLE_KEY_1, 'test')
})

test('envs throws an error if an environment variable is missing', () => {
  assert.throws(() => envs.EXAMPLE_KEY_2, 'Environment variable EXAMPLE_KEY_2 is not set')
})
