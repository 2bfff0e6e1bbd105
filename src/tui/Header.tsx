import { Box, Text } from 'ink';
import type { TeamStatus } from '../types/index.js';

interface HeaderProps {
  team: TeamStatus;
}

export function Header({ team }: HeaderProps) {
  const percent = Math.round(team.completionRate * 100);

  return (
    <Box borderStyle="single" paddingX={1} justifyContent="space-between">
      <Box>
        <Text bold>taskloom</Text>
        <Text> | </Text>
        <Text>tasks: </Text>
        <Text color="green">{team.completedTasks}✓</Text>
        <Text> </Text>
        <Text color="cyan">{team.inProgress}⟳</Text>
        <Text> </Text>
        <Text color="gray">{team.readyToStart} ready</Text>
        {team.activeBlockers > 0 && (
          <>
            <Text> | </Text>
            <Text color="red">{team.activeBlockers} blockers</Text>
          </>
        )}
        {team.escalations.length > 0 && (
          <>
            <Text> | </Text>
            <Text color="red">escalated: {team.escalations.join(', ')}</Text>
          </>
        )}
      </Box>
      <Text color={percent === 100 ? 'green' : 'yellow'}>
        {percent}% of {team.totalTasks}
      </Text>
    </Box>
  );
}
