/**
 * Message Router
 *
 * Decides which task a free-form chat message asks for. Precedence:
 * explicit type, then a leading marker ("пост: ..."), then keywords
 * anywhere in the message, then plain conversation.
 */

import { isTaskKind, type TaskKind } from '../agents/prompts.js';

export interface RoutedMessage {
  taskKind: TaskKind;
  /** The message with any routing marker removed. */
  request: string;
}

export interface RouteOptions {
  /** `post`, `ideas`, ... or `general`/absent to detect from the text. */
  explicitType?: string | null;
  /** Whether the chat already has earlier turns; enables edit detection. */
  hasHistory?: boolean;
}

interface PrefixMarker {
  text: string;
  /** Remove the marker from the request, or keep it as part of the request. */
  strip: boolean;
}

interface PrefixRule {
  kind: TaskKind;
  markers: PrefixMarker[];
}

interface KeywordRule {
  kind: TaskKind;
  keywords: string[];
  requiresHistory?: boolean;
}

const PREFIX_RULES: PrefixRule[] = [
  {
    kind: 'post',
    markers: [
      { text: 'пост:', strip: true },
      { text: 'напиши пост', strip: false },
      { text: 'создай пост', strip: false },
    ],
  },
  {
    kind: 'ideas',
    markers: [
      { text: 'идеи:', strip: true },
      { text: 'предложи идеи', strip: true },
      { text: 'идеи для постов', strip: true },
    ],
  },
  {
    kind: 'research',
    markers: [
      { text: 'исследование:', strip: true },
      { text: 'расскажи о', strip: false },
      { text: 'что такое', strip: false },
    ],
  },
  {
    kind: 'refinement',
    markers: [{ text: 'правка:', strip: true }],
  },
];

// Order matters: the first rule with a matching keyword wins
const KEYWORD_RULES: KeywordRule[] = [
  {
    kind: 'refinement',
    keywords: ['перепиши', 'сделай короче', 'сделай длиннее', 'исправь', 'измени'],
    requiresHistory: true,
  },
  { kind: 'post', keywords: ['пост', 'напиши', 'создай'] },
  { kind: 'ideas', keywords: ['идеи', 'предложи', 'темы'] },
  { kind: 'research', keywords: ['расскажи', 'что такое', 'как', 'почему'] },
];

function matchPrefix(message: string): RoutedMessage | null {
  const lower = message.toLowerCase();

  for (const rule of PREFIX_RULES) {
    for (const marker of rule.markers) {
      if (lower.startsWith(marker.text)) {
        const request = marker.strip ? message.slice(marker.text.length).trim() : message;
        return { taskKind: rule.kind, request };
      }
    }
  }
  return null;
}

function matchKeywords(message: string, hasHistory: boolean): TaskKind | null {
  const lower = message.toLowerCase();

  for (const rule of KEYWORD_RULES) {
    if (rule.requiresHistory && !hasHistory) continue;
    if (rule.keywords.some((keyword) => lower.includes(keyword))) {
      return rule.kind;
    }
  }
  return null;
}

/**
 * Route a chat message to a task kind.
 *
 * @example
 * routeMessage('пост: зимние ароматы')
 * // { taskKind: 'post', request: 'зимние ароматы' }
 */
export function routeMessage(message: string, options: RouteOptions = {}): RoutedMessage {
  const { explicitType, hasHistory = false } = options;
  const text = message.trim();

  if (explicitType && isTaskKind(explicitType)) {
    // A redundant marker of the same kind is still removed
    const prefixed = matchPrefix(text);
    const request = prefixed && prefixed.taskKind === explicitType ? prefixed.request : text;
    return { taskKind: explicitType, request };
  }

  const prefixed = matchPrefix(text);
  if (prefixed) {
    return prefixed;
  }

  const detected = matchKeywords(text, hasHistory);
  return { taskKind: detected ?? 'conversation', request: text };
}
