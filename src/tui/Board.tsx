import { Box, Text } from 'ink';
import type { TaskSnapshot, TeamStatus } from '../types/index.js';
import { buildBoard } from './board-formatting.js';
import { Column } from './Column.js';
import { Header } from './Header.js';

interface BoardProps {
  tasks: TaskSnapshot[];
  team: TeamStatus;
}

export function Board({ tasks, team }: BoardProps) {
  const columns = buildBoard(tasks);

  return (
    <Box flexDirection="column">
      <Header team={team} />
      {tasks.length === 0 ? (
        <Box paddingX={1}>
          <Text dimColor>No tasks yet. Create one with `tl create`.</Text>
        </Box>
      ) : (
        <Box>
          {columns.map((column) => (
            <Column key={column.title} column={column} totalColumns={columns.length} />
          ))}
        </Box>
      )}
    </Box>
  );
}
