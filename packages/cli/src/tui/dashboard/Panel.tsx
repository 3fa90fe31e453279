import React from 'react'
import { Box, Text } from 'ink'
import { hex } from '../theme.js'

interface PanelProps {
  label: string
  meta?: string | undefined
  children: React.ReactNode
}

/**
 * Panel — bordered box with an uppercase label and right-aligned meta.
 */
export function Panel({ label, meta, children }: PanelProps): React.ReactElement {
  return (
    <Box flexDirection="column" borderStyle="single" borderColor={hex.border} paddingX={1}>
      <Box justifyContent="space-between">
        <Text color={hex.blue}>{label.toUpperCase()}</Text>
        {meta !== undefined && <Text color={hex.muted}>{meta}</Text>}
      </Box>
      {children}
    </Box>
  )
}
