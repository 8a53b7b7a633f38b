import type { ResponsesUsage } from '../shared/usage-rendering.js';

export interface ResponsesOutputItem {
  type: 'text';
  content: string;
}

export interface ResponsesResponse {
  id: string;
  object: 'response';
  model: string;
  status: 'completed';
  output: ResponsesOutputItem[];
  previous_response_id?: string;
  usage: ResponsesUsage;
  created_at: number;
}

/** One normalized entry of a Responses input or of stored session history. */
export interface ResponsesItem {
  type: string;
  role?: string;
  content: unknown;
}
