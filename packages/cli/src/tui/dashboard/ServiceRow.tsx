import React from 'react'
import { Box, Text } from 'ink'
import type { ServiceRecord, StatusSnapshot } from '@render-dash/core'
import { deployHex, hex, stateHex } from '../theme.js'
import { deploySummary, errorLabel, stateGlyph } from '../output/format.js'

interface ServiceRowProps {
  record: ServiceRecord
  snapshot: StatusSnapshot
  selected: boolean
  now: Date
}

/**
 * ServiceRow — one service: state dot, name, state, id; then URL and the
 * latest deploy; then the last error, if any. The last known state stays
 * visible while an error is shown.
 */
export function ServiceRow({ record, snapshot, selected, now }: ServiceRowProps): React.ReactElement {
  const stateColor = stateHex(snapshot.serviceState)
  const deploy = snapshot.latestDeploy
  const error = snapshot.lastError

  return (
    <Box flexDirection="column">
      <Box gap={1}>
        <Text color={selected ? hex.blue : hex.dim}>{selected ? '›' : ' '}</Text>
        <Text color={stateColor}>{stateGlyph(snapshot.serviceState)}</Text>
        <Text color={hex.white} bold={selected}>{record.name}</Text>
        <Text color={stateColor}>{snapshot.serviceState}</Text>
        <Text color={hex.dim}>{record.id}</Text>
        {snapshot.inFlight && <Text color={hex.muted}>…</Text>}
      </Box>

      {(snapshot.serviceUrl !== undefined || deploy !== undefined) && (
        <Box paddingLeft={4} gap={2}>
          {snapshot.serviceUrl !== undefined && <Text color={hex.blueDim}>{snapshot.serviceUrl}</Text>}
          {deploy !== undefined && (
            <Text color={deployHex(deploy.deployState)}>{deploySummary(deploy, now)}</Text>
          )}
        </Box>
      )}

      {error !== undefined && (
        <Box paddingLeft={4}>
          <Text color={hex.red}>⚠ {errorLabel(error)}: {error.message}</Text>
        </Box>
      )}
    </Box>
  )
}
