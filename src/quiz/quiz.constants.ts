export const QUESTIONS_PER_QUIZ = 3;

export const DEFAULT_DIFFICULTY = 'medium';

export const GENERATION_TEMPERATURE = 0.7;
export const GENERATION_TOP_P = 1;
export const GENERATION_MAX_TOKENS = 2000;

export const DEFAULT_LLM_BASE_URL = 'https://api.groq.com/openai/v1';
export const DEFAULT_LLM_MODEL = 'llama-3.3-70b-versatile';

export const DEFAULT_MAX_SESSIONS = 1000;
