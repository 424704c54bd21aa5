import React, { useState } from 'react';
import { Box, Text, useInput } from 'ink';

export interface MenuItem<T extends string> {
  id: T;
  label: string;
  desc?: string;
}

interface MenuProps<T extends string> {
  title: string;
  items: MenuItem<T>[];
  onSelect: (id: T) => void;
  /** Esc handler; omitted on the top-level menu */
  onBack?: () => void;
  isActive?: boolean;
}

/**
 * Vertical menu: arrows and Enter, or the item's number
 */
export function Menu<T extends string>({ title, items, onSelect, onBack, isActive = true }: MenuProps<T>) {
  const [selectedIndex, setSelectedIndex] = useState(0);

  useInput((input, key) => {
    if (key.upArrow) {
      setSelectedIndex(i => (i - 1 + items.length) % items.length);
    } else if (key.downArrow) {
      setSelectedIndex(i => (i + 1) % items.length);
    } else if (key.return) {
      const item = items[selectedIndex];
      if (item) onSelect(item.id);
    } else if (key.escape && onBack) {
      onBack();
    } else if (/^[1-9]$/.test(input)) {
      const item = items[parseInt(input, 10) - 1];
      if (item) onSelect(item.id);
    }
  }, { isActive });

  return (
    <Box flexDirection="column" borderStyle="round" borderColor="cyan" paddingX={2} paddingY={1}>
      <Text bold color="cyan">{title}</Text>
      <Box flexDirection="column" marginTop={1}>
        {items.map((item, idx) => (
          <Box key={item.id}>
            <Text color={idx === selectedIndex ? 'green' : undefined} bold={idx === selectedIndex}>
              {idx === selectedIndex ? '❯ ' : '  '}{idx + 1}. {item.label}
            </Text>
            {item.desc && idx === selectedIndex && <Text dimColor>  {item.desc}</Text>}
          </Box>
        ))}
      </Box>
    </Box>
  );
}

export default Menu;
