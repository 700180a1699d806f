export enum Provider {
  OpenAI = 'openai',
  Bedrock = 'bedrock',
  ClaudeWeb = 'claudeweb',
  Bard = 'bard',
  Together = 'together',
}

export const OPENAI_MODELS: readonly string[] = [
  'gpt-3.5-turbo',
  'gpt-3.5-turbo-16k',
  'gpt-4',
  'gpt-4-32k',
  'gpt-4-1106-preview',
];

export const BEDROCK_CLAUDE_MODELS: readonly string[] = [
  'anthropic.claude-v2',
  'anthropic.claude-v1',
  'anthropic.claude-instant-v1',
];

export const CLAUDE_WEB_MODEL = 'claude-2';

export const BARD_MODEL = 'bard';

export interface ModelInfo {
  id: string;
  object: 'model';
  owned_by: Provider;
}
