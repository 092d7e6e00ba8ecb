// =============================================================================
// rseq-midi - Decoder Options Tests
// =============================================================================

import { DEFAULT_DECODER_OPTIONS, resolveDecoderOptions } from '../options'
import { consoleLogger, silentLogger } from '../logger'

describe('resolveDecoderOptions', () => {
  it('fills every unset option from the defaults', () => {
    expect(resolveDecoderOptions()).toEqual(DEFAULT_DECODER_OPTIONS)
    expect(resolveDecoderOptions().logger).toBe(consoleLogger)
  })

  it('keeps options that are set', () => {
    expect(resolveDecoderOptions({ ignoreJumps: true, logger: silentLogger })).toEqual({
      ignoreJumps: true,
      debugControllers: false,
      logger: silentLogger
    })
  })

  it('treats explicitly undefined options as unset', () => {
    expect(resolveDecoderOptions({ debugControllers: undefined }).debugControllers).toBe(false)
  })
})
