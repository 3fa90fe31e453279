import chalk, { type ChalkInstance } from 'chalk'
import { DeployState, ServiceState } from '@render-dash/core'

export const hex = {
  blue:    '#4FC3F7',
  blueDim: '#0277BD',
  text:    '#C8C8C0',
  white:   '#F2F2EC',
  dim:     '#444444',
  muted:   '#666666',
  border:  '#242424',
  amber:   '#D4880A',
  green:   '#81C784',
  red:     '#CF6679',
} as const

export const t = {
  blue:    chalk.hex(hex.blue),
  blueDim: chalk.hex(hex.blueDim),
  text:    chalk.hex(hex.text),
  white:   chalk.hex(hex.white),
  dim:     chalk.hex(hex.dim),
  muted:   chalk.hex(hex.muted),
  amber:   chalk.hex(hex.amber),
  green:   chalk.hex(hex.green),
  red:     chalk.hex(hex.red),
} as const

const _stateHex: Record<ServiceState, string> = {
  [ServiceState.Running]:   hex.green,
  [ServiceState.Deploying]: hex.amber,
  [ServiceState.Suspended]: hex.muted,
  [ServiceState.Failed]:    hex.red,
  [ServiceState.Unknown]:   hex.dim,
}

export const stateHex = (state: ServiceState): string => _stateHex[state]

export const stateColor = (state: ServiceState): ChalkInstance => chalk.hex(_stateHex[state])

const _deployHex: Record<DeployState, string> = {
  [DeployState.Live]:     hex.green,
  [DeployState.Building]: hex.amber,
  [DeployState.Created]:  hex.amber,
  [DeployState.Failed]:   hex.red,
  [DeployState.Canceled]: hex.muted,
}

export const deployHex = (state: DeployState): string => _deployHex[state]

export const deployColor = (state: DeployState): ChalkInstance => chalk.hex(_deployHex[state])
