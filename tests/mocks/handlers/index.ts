import { groqHandlers } from './groq.js';

// Export all handlers for MSW
export const handlers = [...groqHandlers];
