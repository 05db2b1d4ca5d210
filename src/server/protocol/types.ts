export type ClientRole = 'user' | 'assistant' | 'tool' | 'system'

export interface TextBlock {
  type: 'text'
  text: string
}

export interface ThinkingBlock {
  type: 'thinking'
  thinking: string
  signature?: string
}

export interface ToolUseBlock {
  type: 'tool_use'
  id: string
  name: string
  input: unknown
}

export interface ToolResultPart {
  type: string
  text?: string
}

export interface ToolResultBlock {
  type: 'tool_result'
  tool_use_id: string
  content: string | ToolResultPart[]
  is_error?: boolean
}

export type ContentBlock = TextBlock | ThinkingBlock | ToolUseBlock | ToolResultBlock

export interface ClientMessage {
  role: ClientRole
  content: string | ContentBlock[]
}

export interface ClientTool {
  name: string
  description?: string
  input_schema: Record<string, unknown>
}

export interface MessagesRequest {
  model: string
  messages: ClientMessage[]
  system?: string | TextBlock[]
  tools?: ClientTool[]
  max_tokens: number
  temperature?: number
  top_p?: number
  stop_sequences?: string[]
  stream: boolean
  metadata?: Record<string, unknown>
}

export type TokenCountRequest = Pick<MessagesRequest, 'messages' | 'system' | 'tools'>

export type StopReason = 'end_turn' | 'max_tokens' | 'tool_use' | 'stop_sequence'

export interface ClientUsage {
  input_tokens: number
  output_tokens: number
  cache_creation_input_tokens: number
  cache_read_input_tokens: number
}

export type ResponseBlock = TextBlock | ThinkingBlock | ToolUseBlock

export interface MessagesResponse {
  id: string
  type: 'message'
  role: 'assistant'
  model: string
  content: ResponseBlock[]
  stop_reason: StopReason
  stop_sequence: null
  usage: ClientUsage
}

// Client protocol stream events

export type BlockStart =
  | { type: 'text'; text: string }
  | { type: 'thinking'; thinking: string }
  | { type: 'tool_use'; id: string; name: string; input: Record<string, never> }

export type BlockDelta =
  | { type: 'text_delta'; text: string }
  | { type: 'thinking_delta'; thinking: string }
  | { type: 'input_json_delta'; partial_json: string }

export interface MessageStartEvent {
  type: 'message_start'
  message: {
    id: string
    type: 'message'
    role: 'assistant'
    content: []
    model: string
    stop_reason: null
    stop_sequence: null
    usage: { input_tokens: number; output_tokens: number }
  }
}

export interface ContentBlockStartEvent {
  type: 'content_block_start'
  index: number
  content_block: BlockStart
}

export interface ContentBlockDeltaEvent {
  type: 'content_block_delta'
  index: number
  delta: BlockDelta
}

export interface ContentBlockStopEvent {
  type: 'content_block_stop'
  index: number
}

export interface MessageDeltaEvent {
  type: 'message_delta'
  delta: { stop_reason: StopReason; stop_sequence: null }
  usage: { output_tokens: number }
}

export interface MessageStopEvent {
  type: 'message_stop'
}

export interface DoneEvent {
  type: 'done'
}

export type StreamEvent =
  | MessageStartEvent
  | ContentBlockStartEvent
  | ContentBlockDeltaEvent
  | ContentBlockStopEvent
  | MessageDeltaEvent
  | MessageStopEvent
  | DoneEvent

// Upstream (chat completions) protocol

export interface ProviderToolCall {
  id: string
  type: 'function'
  function: {
    name: string
    arguments: string
  }
}

export interface ProviderChatMessage {
  role: 'system' | 'user' | 'assistant' | 'tool'
  content: string | null
  tool_calls?: ProviderToolCall[]
  tool_call_id?: string
}

export interface ProviderTool {
  type: 'function'
  function: {
    name: string
    description: string
    parameters: Record<string, unknown>
  }
}

export interface ProviderChatRequestBody {
  model: string
  messages: ProviderChatMessage[]
  max_tokens: number
  temperature?: number
  top_p?: number
  stop?: string[]
  tools?: ProviderTool[]
  chat_template_kwargs: { thinking: boolean }
}

export interface ProviderUsage {
  prompt_tokens?: number
  completion_tokens?: number
  total_tokens?: number
}

export interface ProviderToolCallDelta {
  index?: number
  id?: string | null
  type?: 'function'
  function?: {
    name?: string | null
    arguments?: string | null
  }
}

export interface ProviderStreamDelta {
  role?: string
  content?: string | null
  reasoning_content?: string | null
  tool_calls?: ProviderToolCallDelta[] | null
}

export interface ProviderStreamChunk {
  id?: string
  choices?: Array<{
    index?: number
    delta?: ProviderStreamDelta
    finish_reason?: string | null
  }>
  usage?: ProviderUsage | null
}

export interface ProviderReasoningDetail {
  type?: string
  text?: string
}

export interface ProviderResponseMessage {
  role?: string
  content?: string | Array<{ type?: string; text?: string }> | null
  reasoning_content?: string | null
  reasoning_details?: ProviderReasoningDetail[] | null
  tool_calls?: Array<{
    id: string
    type?: 'function'
    function: {
      name: string
      arguments?: string
    }
  }> | null
}

export interface ProviderChatResponse {
  id?: string
  choices: Array<{
    index?: number
    message: ProviderResponseMessage
    finish_reason?: string | null
  }>
  usage?: ProviderUsage | null
}
