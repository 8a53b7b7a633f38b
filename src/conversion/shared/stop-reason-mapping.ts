// Finish/stop reason tables. They are not symmetric: several reasons collapse
// into STOP on the Gemini side and cannot be recovered on the way back.

export function openAIFinishReasonToClaude(finishReason: string | null | undefined, hasToolCalls: boolean): string {
  if (hasToolCalls) return 'tool_use';
  if (finishReason === 'length') return 'max_tokens';
  return 'end_turn';
}

export function claudeStopReasonToGemini(stopReason: string | null | undefined): string {
  switch (stopReason) {
    case 'max_tokens':
      return 'MAX_TOKENS';
    case 'end_turn':
    case 'stop_sequence':
    case 'tool_use':
    default:
      return 'STOP';
  }
}

export function openAIFinishReasonToGemini(finishReason: string | null | undefined): string {
  switch (finishReason) {
    case 'length':
      return 'MAX_TOKENS';
    case 'content_filter':
      return 'SAFETY';
    case 'stop':
    case 'tool_calls':
    case 'function_call':
    default:
      return 'STOP';
  }
}

/** SAFETY and RECITATION land on end_turn: Claude has no equivalent. */
export function geminiFinishReasonToClaude(finishReason: string | null | undefined): string {
  switch (finishReason) {
    case 'MAX_TOKENS':
      return 'max_tokens';
    case 'STOP':
    case 'SAFETY':
    case 'RECITATION':
    default:
      return 'end_turn';
  }
}

export function geminiFinishReasonToOpenAI(finishReason: string | null | undefined): string {
  switch (finishReason) {
    case 'MAX_TOKENS':
      return 'length';
    case 'SAFETY':
      return 'content_filter';
    case 'STOP':
    default:
      return 'stop';
  }
}

export function isToolInvocationFinish(finishReason: string): boolean {
  return finishReason === 'tool_calls' || finishReason === 'function_call';
}
