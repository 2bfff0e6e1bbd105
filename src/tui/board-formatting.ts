/**
 * Board layout and formatting utilities for the TUI.
 * Kept free of ink so the column grouping can be tested without rendering.
 */

import {
  TASK_PRIORITIES,
  type TaskPriority,
  type TaskSnapshot,
  type TaskState,
} from '../types/index.js';

export interface BoardColumnSpec {
  title: string;
  states: TaskState[];
}

export const BOARD_COLUMNS: BoardColumnSpec[] = [
  { title: 'Todo', states: ['new'] },
  {
    title: 'Active',
    states: [
      'analyzing',
      'planning',
      'implementing',
      'debugging',
      'documenting',
      'devops',
      'security_audit',
    ],
  },
  { title: 'Review', states: ['reviewing', 'testing', 'iteration'] },
  { title: 'Blocked', states: ['blocked'] },
  { title: 'Done', states: ['complete'] },
];

export interface BoardCard {
  id: string;
  title: string;
  state: TaskState;
  priority: TaskPriority;
  assignee: string;
  progress: number;
  ready: boolean;
  escalated: boolean;
  blockerCount: number;
}

export interface BoardColumn {
  title: string;
  cards: BoardCard[];
}

function toCard(task: TaskSnapshot): BoardCard {
  return {
    id: task.id,
    title: task.title,
    state: task.state,
    priority: task.priority,
    assignee: task.assignee,
    progress: task.progress,
    ready: task.ready,
    escalated: task.escalationRequired,
    blockerCount: task.blockers.length,
  };
}

/**
 * Group tasks into the board columns. Within a column higher priorities come first;
 * equal priorities keep the order tasks were given in.
 */
export function buildBoard(tasks: TaskSnapshot[]): BoardColumn[] {
  return BOARD_COLUMNS.map((column) => ({
    title: column.title,
    cards: tasks
      .filter((task) => column.states.includes(task.state))
      .map(toCard)
      .sort(
        (a, b) => TASK_PRIORITIES.indexOf(b.priority) - TASK_PRIORITIES.indexOf(a.priority)
      ),
  }));
}

export function getStateIndicator(state: TaskState): { symbol: string; color: string } {
  switch (state) {
    case 'new':
      return { symbol: '○', color: 'gray' };
    case 'complete':
      return { symbol: '✓', color: 'green' };
    case 'blocked':
      return { symbol: '✗', color: 'red' };
    case 'iteration':
      return { symbol: '↺', color: 'yellow' };
    case 'reviewing':
    case 'testing':
      return { symbol: '◎', color: 'cyan' };
    default:
      return { symbol: '⟳', color: 'yellow' };
  }
}

export function getPriorityColor(priority: TaskPriority): string | undefined {
  switch (priority) {
    case 'critical':
      return 'red';
    case 'high':
      return 'yellow';
    case 'low':
      return 'gray';
    default:
      return undefined;
  }
}

export function truncate(text: string, limit: number): string {
  if (text.length <= limit) {
    return text;
  }
  if (limit <= 1) {
    return text.slice(0, limit);
  }
  return `${text.slice(0, limit - 1)}…`;
}

export function formatProgressBar(progress: number, width = 10): string {
  const clamped = Math.max(0, Math.min(100, progress));
  const filled = Math.round((clamped / 100) * width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
}

/**
 * Flags shown after a card title: `!` for escalation, `⚑n` for open blockers.
 */
export function formatCardFlags(card: BoardCard): string {
  const flags: string[] = [];
  if (card.escalated) flags.push('!');
  if (card.blockerCount > 0) flags.push(`⚑${card.blockerCount}`);
  return flags.join(' ');
}
