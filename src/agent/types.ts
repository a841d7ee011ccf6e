// ============================================
// Agent Types: conversation, tools, reasoner contract
// ============================================

export type Role = "user" | "assistant" | "tool";

export interface ToolCall {
  /** Identifier assigned by the reasoner; echoed on the tool-result message */
  id: string;
  name: string;
  /** Query text handed to the tool */
  argument: string;
}

export interface Message {
  role: Role;
  content: string;
  /** Set on assistant messages that request tools */
  toolCalls?: ToolCall[];
  /** Set on tool messages: the call that produced this result */
  toolCallId?: string;
  /** Set on tool messages: the tool that produced this result */
  name?: string;
}

/**
 * Ordered, append-only history for one request.
 */
export type Conversation = Message[];

/**
 * A named, described callable the reasoner may request mid-conversation.
 */
export interface Tool {
  readonly name: string;
  readonly description: string;
  invoke(query: string, signal?: AbortSignal): Promise<string>;
}

export type ToolDescriptor = Pick<Tool, "name" | "description">;

export type Decision =
  | { type: "final"; content: string }
  | { type: "tool_calls"; content: string; calls: ToolCall[] };

/**
 * Opaque reasoning step: given the history and the available tools,
 * either answer or ask for tool calls.
 */
export interface Reasoner {
  decide(conversation: readonly Message[], tools: readonly ToolDescriptor[], signal?: AbortSignal): Promise<Decision>;
}

export type AgentState = "THINKING" | "TOOL_CALL" | "DONE" | "FAILED";

export interface AgentResult {
  answer: string;
  state: Extract<AgentState, "DONE" | "FAILED">;
  /** Number of THINKING steps taken */
  rounds: number;
  /** Set when the loop ended in FAILED */
  error?: Error;
}
