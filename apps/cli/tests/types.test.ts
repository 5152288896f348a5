import { describe, expect, it } from 'vitest'
import {
  ProvisionInputSchema,
  StatusInputSchema,
  provisionInputFrom,
  statusInputFrom,
} from '../src/types.js'

describe('provisionInputFrom', () => {
  it('falls back to the built-in defaults', () => {
    expect(ProvisionInputSchema.parse(provisionInputFrom({}, {}))).toEqual({
      home: '/var/gantry_home',
      identifierFile: '/run/secrets/gantry-admin-id',
      secretFile: '/run/secrets/gantry-admin-secret',
    })
  })

  it('reads the environment it is given at call time', () => {
    const env = {
      GANTRY_HOME: '/srv/gantry',
      GANTRY_ADMIN_ID_FILE: '/srv/secrets/id',
      GANTRY_ADMIN_SECRET_FILE: '/srv/secrets/secret',
    }

    expect(ProvisionInputSchema.parse(provisionInputFrom({}, env))).toEqual({
      home: '/srv/gantry',
      identifierFile: '/srv/secrets/id',
      secretFile: '/srv/secrets/secret',
    })
  })

  it('prefers command-line options over the environment', () => {
    const input = provisionInputFrom(
      { home: '/tmp/home', adminIdFile: '/tmp/id' },
      { GANTRY_HOME: '/srv/gantry', GANTRY_ADMIN_ID_FILE: '/srv/secrets/id' }
    )

    expect(ProvisionInputSchema.parse(input)).toEqual({
      home: '/tmp/home',
      identifierFile: '/tmp/id',
      secretFile: '/run/secrets/gantry-admin-secret',
    })
  })
})

describe('statusInputFrom', () => {
  it('uses GANTRY_HOME when no option is given', () => {
    expect(StatusInputSchema.parse(statusInputFrom({}, { GANTRY_HOME: '/srv/gantry' }))).toEqual({
      home: '/srv/gantry',
    })
  })
})
