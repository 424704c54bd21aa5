import React from 'react';
import { Box, Text } from 'ink';
import { evalBarFill } from '../../chess/notation.js';

interface EvalBarProps {
  /** Centipawns, null when there is no evaluation */
  cp: number | null;
  height?: number;
}

/**
 * Vertical bar beside the board, filled from the bottom
 */
export function EvalBar({ cp, height = 10 }: EvalBarProps) {
  const filled = cp === null ? 0 : evalBarFill(cp, height);
  const cells = Array.from({ length: height }, (_, i) => height - i <= filled);

  return (
    <Box flexDirection="column" marginX={1}>
      {cells.map((on, i) => (
        <Text key={i} color={cp === null ? 'gray' : on ? 'whiteBright' : 'blackBright'}>
          {on ? '██' : '░░'}
        </Text>
      ))}
    </Box>
  );
}
