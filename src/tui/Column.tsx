import { Box, Text, useStdout } from 'ink';
import {
  type BoardColumn,
  formatCardFlags,
  formatProgressBar,
  getPriorityColor,
  getStateIndicator,
  truncate,
} from './board-formatting.js';

interface ColumnProps {
  column: BoardColumn;
  totalColumns: number;
}

export function Column({ column, totalColumns }: ColumnProps) {
  const { stdout } = useStdout();
  const terminalWidth = stdout?.columns || 120;

  // Box borders and padding take 4 characters per column
  const columnChars = Math.floor(terminalWidth / totalColumns) - 4;
  const titleLimit = Math.max(10, columnChars - 8);

  return (
    <Box
      flexDirection="column"
      borderStyle="single"
      width={`${Math.floor(100 / totalColumns)}%`}
      overflow="hidden"
    >
      <Box paddingX={1}>
        <Text bold>{column.title}</Text>
        <Text dimColor> ({column.cards.length})</Text>
      </Box>

      {column.cards.map((card) => {
        const indicator = getStateIndicator(card.state);
        const flags = formatCardFlags(card);
        return (
          <Box key={card.id} flexDirection="column" paddingX={1} marginTop={1}>
            <Box>
              <Text color={indicator.color}>{indicator.symbol} </Text>
              <Text color={getPriorityColor(card.priority)}>{card.id}</Text>
              {flags && <Text color="red"> {flags}</Text>}
            </Box>
            <Text wrap="truncate">{truncate(card.title, titleLimit)}</Text>
            <Box>
              <Text dimColor>{card.assignee} </Text>
              <Text color={indicator.color}>{formatProgressBar(card.progress)}</Text>
              <Text dimColor> {card.state}</Text>
            </Box>
          </Box>
        );
      })}
    </Box>
  );
}
