/**
 * Structural view of the messages streamed by the Claude Agent SDK's query() function.
 *
 * Only the fields the worker reads are listed, so every SDKMessage variant is assignable
 * to AgentMessage and test doubles can yield plain objects.
 */

export interface AgentMessage {
  type: string;
  subtype?: string;
  result?: string;
  total_cost_usd?: number;
}

export interface AgentResultMessage extends AgentMessage {
  type: 'result';
}

/**
 * Type guard to check if a message is a result message.
 * Result messages end a run and carry the final text on success.
 */
export function isResultMessage(message: AgentMessage): message is AgentResultMessage {
  return message.type === 'result';
}
