import { describe, expect, it } from 'vitest'

import { MissingHostnameError } from '../errors.js'
import { getHostname } from './source.js'

const failingCommand = async (): Promise<string> => {
  throw new Error('hostname: command not found')
}

describe('getHostname', () => {
  it('prefers HOSTNAME', async () => {
    const env = { HOSTNAME: 'login01.jureca', HOST: 'other' }
    expect(await getHostname({ env, command: failingCommand })).toBe('login01.jureca')
  })

  it('falls back to HOST when HOSTNAME is blank', async () => {
    const env = { HOSTNAME: '  ', HOST: 'jrc0042.jureca' }
    expect(await getHostname({ env, command: failingCommand })).toBe('jrc0042.jureca')
  })

  it('falls back to the hostname command and trims its output', async () => {
    const hostname = await getHostname({ env: {}, command: async () => 'workstation\n' })
    expect(hostname).toBe('workstation')
  })

  it('throws MissingHostnameError when the command prints nothing', async () => {
    await expect(getHostname({ env: {}, command: async () => '\n' })).rejects.toBeInstanceOf(
      MissingHostnameError
    )
  })

  it('throws MissingHostnameError when every source fails', async () => {
    await expect(getHostname({ env: { HOST: '' }, command: failingCommand })).rejects.toBeInstanceOf(
      MissingHostnameError
    )
  })
})
