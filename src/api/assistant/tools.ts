import type { Request } from 'express';
import { getCalculatorTool } from '../../utils/assistant/tool';
import type { CalculatorTool } from '../../utils/assistant/tool';

/**
 * Tool definitions for the assistant's language-model requests
 */
export function getAssistantTools(_request: Request): CalculatorTool[] {
  return [getCalculatorTool()];
}
