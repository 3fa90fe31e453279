import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'

interface DashboardHeaderProps {
  serviceCount: number
  refreshSeconds: number
}

/**
 * DashboardHeader — ◈ RDASH — 4 services · every 30s        key hints
 */
export function DashboardHeader({ serviceCount, refreshSeconds }: DashboardHeaderProps): React.ReactElement {
  return (
    <Box justifyContent="space-between" paddingX={1} borderStyle="single" borderColor={hex.border}>
      <Box gap={1}>
        <Text color={hex.blue} bold>◈ RDASH</Text>
        <Text color={hex.dim}>—</Text>
        <Text color={hex.muted}>{serviceCount === 1 ? '1 service' : `${serviceCount} services`}</Text>
        <Text color={hex.dim}>·</Text>
        <Text color={hex.muted}>every {refreshSeconds}s</Text>
      </Box>
      <Text color={hex.dim}>↑↓ select · l logs · e events · d deploys · s settings</Text>
    </Box>
  )
}
