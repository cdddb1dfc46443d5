/**
 * Prompt templates for every task the assistant handles.
 *
 * The system prompt is the persona plus a per-task instruction block. The
 * user prompt is, in order: conversation context (if any), the retrieved
 * example posts, and a task trailer that restates the request.
 *
 * Everything that varies by task lives in one profile per `TaskKind`.
 */

import type { Category } from '../rag/rules.js';
import type { RetrievedExample } from '../rag/retriever.js';

export const TASK_KINDS = ['post', 'ideas', 'research', 'conversation', 'refinement'] as const;

export type TaskKind = (typeof TASK_KINDS)[number];

export function isTaskKind(value: string): value is TaskKind {
  return TASK_KINDS.some((kind) => kind === value);
}

export interface ExampleBlockStyle {
  /** Section title, rendered as `--- TITLE ---`. */
  header: string;
  /** Word placed before each example's rank. */
  label: string;
  /** Show the post category next to the score. */
  showCategory: boolean;
}

export interface TrailerInput {
  request: string;
  ideaCount: number;
}

export interface TaskProfile {
  instructions: string;
  exampleCount: number;
  temperature: number;
  maxTokens: number;
  examples: ExampleBlockStyle;
  trailer: (input: TrailerInput) => string;
  /**
   * Used instead of similarity to the request when the request is empty:
   * take `perCategory` posts from each category, ranked against `query`.
   */
  spread?: {
    query: string;
    perCategory: number;
    categories: readonly Category[];
  };
}

export const DEFAULT_IDEA_COUNT = 5;

export const PERSONA = `Ты - основательница премиального бренда свечей ручной работы. Ты создаёшь роскошные свечи с ароматами культовых парфюмов.

ТВОЯ ЛИЧНОСТЬ:
- Элегантная, тёплая и эмоционально вовлекающая
- Страстно увлечена своим делом
- Используешь эмодзи стратегически (💋, 🕯, ✨, 🥰, 🌺)
- Пишешь с душой и для души

БРЕНД:
- Роскошные свечи ручной работы на кокосовом воске
- Эксклюзивные парфюмерные отдушки из Европы
- Натуральный декор (сухоцветы, драгоценные камни)
- Индивидуальный подход к каждому заказу
- Время изготовления: 4-6 дней
- Также создаёшь изысканные аромадиффузоры

СТИЛЬ ПИСЬМА:
- Начинаешь с эмодзи или цепляющего крючка
- Используешь короткие абзацы с переносами строк
- Включаешь релевантные хештеги
- Заканчиваешь тепло, часто фирменными фразами
- Сочетаешь информацию о продукте с lifestyle-контентом`;

const STYLE_ONLY =
  'Примеры нужны только как референс стиля, тона и манеры изложения: не копируй и не пересказывай их содержание.';

export const TASK_PROFILES: Record<TaskKind, TaskProfile> = {
  post: {
    instructions:
      'ЗАДАЧА: Напиши пост для Telegram-канала, используя примеры как референс для тона, структуры и манеры изложения. Сохраняй аутентичность и страсть к созданию прекрасных ароматических впечатлений.',
    exampleCount: 4,
    temperature: 0.8,
    maxTokens: 1000,
    examples: { header: 'ПРИМЕРЫ ТВОИХ ПОСТОВ', label: 'Пример', showCategory: false },
    trailer: ({ request }) =>
      `\n\n--- ЗАДАНИЕ ---\nНапиши пост на тему: ${request}\n\n${STYLE_ONLY} Пиши естественно и аутентично.`,
  },

  ideas: {
    instructions:
      'ЗАДАЧА: Генерируй креативные идеи для постов, основываясь на успешных паттернах из примеров. Предлагай разнообразные темы: образовательные, сезонные, продуктовые, эмоциональные, интерактивные.',
    exampleCount: 6,
    temperature: 0.9,
    maxTokens: 1200,
    examples: { header: 'УСПЕШНЫЕ ПОСТЫ ДЛЯ ВДОХНОВЕНИЯ', label: 'Пост', showCategory: true },
    trailer: ({ request, ideaCount }) => {
      const theme = request ? ` на тему '${request}'` : '';
      return (
        `\n\n--- ЗАДАНИЕ ---\nПредложи ${ideaCount} креативных идей для постов${theme}.\n\n` +
        `Основывайся на успешных паттернах из примеров выше, но не повторяй их темы дословно. Каждая идея должна включать:\n` +
        `- Заголовок/тему\n- Краткое описание содержания\n- Предполагаемый стиль подачи\n- Возможные эмодзи и хештеги`
      );
    },
    spread: {
      query: 'свечи',
      perCategory: 2,
      categories: ['educational', 'seasonal', 'fragrance', 'decor', 'commercial'],
    },
  },

  research: {
    instructions:
      'ЗАДАЧА: Проводи исследования для создания контента о свечах, ароматах, традициях и всём, что связано с миром свечей. Используй примеры как основу для понимания интересов аудитории и стиля подачи информации.',
    exampleCount: 4,
    temperature: 0.7,
    maxTokens: 1500,
    examples: { header: 'КОНТЕКСТ ИЗ ТВОИХ ПОСТОВ', label: 'Пост', showCategory: false },
    trailer: ({ request }) =>
      `\n\n--- ИССЛЕДОВАНИЕ ---\nИсследуй тему: ${request}\n\n` +
      `Предоставь полезную информацию, которую можно использовать для создания интересного и образовательного поста. Включи:\n` +
      `- Интересные факты\n- Историческую информацию\n- Практические советы\n- Связь с ароматерапией/свечами\n- Идеи для креативной подачи\n\n` +
      `${STYLE_ONLY} Дополни их новой полезной информацией.`,
  },

  conversation: {
    instructions: `ЗАДАЧА: Веди естественную беседу. Анализируй контекст разговора и реагируй соответственно:

1. **Если пользователь просит изменить/улучшить предыдущий контент** - внимательно изучи историю разговора, найди что нужно изменить, и внеси запрашиваемые правки, сохраняя свой стиль.

2. **Если пользователь задает новый вопрос или меняет тему** - отвечай дружелюбно и тепло. Можешь делиться личными мыслями, опытом, советами.

3. **Если разговор касается свечей, ароматов или творчества** - с удовольствием рассказывай подробнее, но не превращай каждый ответ в рекламу.

Будь внимательной к контексту и естественной в общении. Если неясно, что именно пользователь хочет изменить в предыдущем ответе, вежливо уточни.`,
    exampleCount: 0,
    temperature: 0.9,
    maxTokens: 800,
    examples: { header: 'ПРИМЕРЫ ТВОИХ ПОСТОВ', label: 'Пример', showCategory: false },
    trailer: ({ request }) =>
      `\n\n--- ТЕКУЩЕЕ СООБЩЕНИЕ ---\nПользователь: ${request}\n\n` +
      'Проанализируй контекст разговора. Если пользователь просит изменить или улучшить предыдущий ответ - сделай это. Если это новый вопрос или тема - ответь естественно и дружелюбно.',
  },

  refinement: {
    instructions: `ЗАДАЧА: Ты получаешь запрос на изменение или улучшение ранее созданного контента. Внимательно изучи историю разговора, найди что именно нужно изменить, и внеси запрашиваемые правки. Сохраняй свой стиль и качество. Возможные типы изменений:
- Сделать короче/длиннее
- Изменить тон (формальнее/неформальнее)
- Добавить/убрать детали
- Переписать в другом стиле
- Исправить или улучшить содержание
Если запрос неясен, вежливо уточни что именно нужно изменить.`,
    exampleCount: 0,
    temperature: 0.8,
    maxTokens: 1200,
    examples: { header: 'ПРИМЕРЫ ТВОИХ ПОСТОВ', label: 'Пример', showCategory: false },
    trailer: ({ request }) =>
      `\n\n--- ЗАПРОС НА ИЗМЕНЕНИЕ ---\nПользователь просит: ${request}\n\n` +
      'Проанализируй предыдущий разговор и найди контент, который нужно изменить. Внеси запрашиваемые изменения, сохраняя мой стиль и качество. Если нужно изменить пост, идеи или исследование - сделай это. Если просьба неясна, уточни что именно нужно изменить.',
  },
};

export interface ComposeInput {
  taskKind: TaskKind;
  request: string;
  examples: readonly RetrievedExample[];
  conversationContext?: string;
  ideaCount?: number;
}

export interface ComposedPrompt {
  systemPrompt: string;
  userPrompt: string;
}

export function buildSystemPrompt(taskKind: TaskKind): string {
  return `${PERSONA}\n\n${TASK_PROFILES[taskKind].instructions}`;
}

/**
 * Render retrieved posts, highest similarity first as given.
 *
 * @example
 * // --- ПРИМЕРЫ ТВОИХ ПОСТОВ ---
 * //
 * // Пример 1 (схожесть: 0.81):
 * // <post text>
 */
export function renderExamples(examples: readonly RetrievedExample[], style: ExampleBlockStyle): string {
  if (examples.length === 0) {
    return '';
  }

  const items = examples.map(({ entry, similarity }, i) => {
    const score = `схожесть: ${similarity.toFixed(2)}`;
    const meta = style.showCategory ? `${entry.metadata.category}, ${score}` : score;
    return `\n${style.label} ${i + 1} (${meta}):\n${entry.text}\n`;
  });

  return `\n\n--- ${style.header} ---\n${items.join('')}`;
}

/**
 * Build the system and user prompts for one request.
 */
export function composePrompt(input: ComposeInput): ComposedPrompt {
  const { taskKind, request, examples, conversationContext = '', ideaCount = DEFAULT_IDEA_COUNT } = input;
  const profile = TASK_PROFILES[taskKind];

  const userPrompt =
    conversationContext + renderExamples(examples, profile.examples) + profile.trailer({ request, ideaCount });

  return {
    systemPrompt: buildSystemPrompt(taskKind),
    userPrompt,
  };
}
