import { reflect, summarize } from './textUtils.js';

export const FIXED_REPLIES = {
  empty: "I'm here! Ask me anything.",
  greeting: 'Hey there! How can I help you today?',
  help: 'I can answer questions, summarize, or brainstorm ideas. Just type your message!',
  emptyTodo: 'Provide items after /todo',
} as const;

const GREETINGS = ['hello', 'hi', 'hey'];
const SUMMARIZE_COMMAND = '/summarize';
const TODO_COMMAND = '/todo';

function renderChecklist(prompt: string): string {
  const bullets = prompt
    .split(' ')
    .slice(1)
    .map((item) => item.trim())
    .filter((item) => item.length > 0)
    .map((item) => `• ${item}`);

  if (bullets.length === 0) {
    return FIXED_REPLIES.emptyTodo;
  }
  return `Here’s your checklist:\n${bullets.join('\n')}`;
}

/**
 * Built-in assistant: maps a user message to a reply without calling any
 * model. Rules are checked in order and the first match wins.
 *
 * Keyword checks are plain substring matches on the lowercased message, so
 * "this" counts as a greeting and "unhelpful" as a help request.
 */
export function generateReply(prompt: string | null | undefined): string {
  const text = (prompt ?? '').trim();
  if (!text) {
    return FIXED_REPLIES.empty;
  }

  const lower = text.toLowerCase();

  if (GREETINGS.some((greeting) => lower.includes(greeting))) {
    return FIXED_REPLIES.greeting;
  }

  if (lower.startsWith('/help') || lower.includes('help')) {
    return FIXED_REPLIES.help;
  }

  if (lower.startsWith(SUMMARIZE_COMMAND)) {
    const body = text.slice(SUMMARIZE_COMMAND.length).trim();
    return `Summary: ${summarize(body)}`;
  }

  if (lower.startsWith(TODO_COMMAND)) {
    return renderChecklist(text);
  }

  return `You said: '${text}'. Here's a helpful thought: ${reflect(text)}`;
}
