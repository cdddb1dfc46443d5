/**
 * Terminal Session
 *
 * Line-oriented loop for trying the assistant locally:
 *   пост: <описание>        generate a post
 *   идеи: <тема>            suggest ideas (theme optional)
 *   исследование: <тема>    research a topic
 *   выход                   quit
 */

import * as readline from 'readline/promises';
import { createModuleLogger, errorMessage } from '../utils/logger.js';
import type { ContentAgent } from '../agents/agent.js';

const logger = createModuleLogger('terminal');

export type TerminalAgent = Pick<ContentAgent, 'writePost' | 'generateIdeas' | 'researchTopic'>;

export interface CommandResult {
  output: string;
  exit: boolean;
}

export const BANNER = [
  '🕯 Добро пожаловать в RAG Bot! 🕯',
  'Доступные команды:',
  "1. 'пост: [описание]' - генерация поста",
  "2. 'идеи: [тема]' - генерация идей для постов",
  "3. 'исследование: [тема]' - исследование темы",
  "4. 'выход' - завершить сессию",
  '-'.repeat(50),
].join('\n');

const PROMPT = '\n💫 Ваш запрос: ';
const GOODBYE = 'До свидания! 💋';
const EXIT_WORDS = ['выход', 'exit', 'quit'];

function after(input: string, marker: string): string | null {
  return input.startsWith(marker) ? input.slice(marker.length).trim() : null;
}

/**
 * Execute one terminal command and return what to print.
 */
export async function handleCommand(agent: TerminalAgent, line: string): Promise<CommandResult> {
  const input = line.trim();

  if (EXIT_WORDS.includes(input.toLowerCase())) {
    return { output: GOODBYE, exit: true };
  }

  const postRequest = after(input, 'пост:');
  if (postRequest !== null) {
    if (!postRequest) {
      return { output: "Пожалуйста, укажите тему поста после 'пост:'", exit: false };
    }
    return { output: `\n📝 Сгенерированный пост:\n${await agent.writePost(postRequest)}`, exit: false };
  }

  const theme = after(input, 'идеи:');
  if (theme !== null) {
    return { output: `\n💡 Идеи для постов:\n${await agent.generateIdeas(theme)}`, exit: false };
  }

  const topic = after(input, 'исследование:');
  if (topic !== null) {
    if (!topic) {
      return { output: "Пожалуйста, укажите тему исследования после 'исследование:'", exit: false };
    }
    return { output: `\n🔍 Результаты исследования:\n${await agent.researchTopic(topic)}`, exit: false };
  }

  return {
    output: "Неизвестная команда. Используйте 'пост:', 'идеи:', 'исследование:' или 'выход'",
    exit: false,
  };
}

export interface TerminalStreams {
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
}

/**
 * Run the interactive loop until the user quits or input ends.
 * Failed commands are reported and the loop continues.
 */
export async function runTerminalSession(
  agent: TerminalAgent,
  streams: TerminalStreams = { input: process.stdin, output: process.stdout }
): Promise<void> {
  const rl = readline.createInterface({ input: streams.input, output: streams.output });
  const print = (text: string) => streams.output.write(`${text}\n`);

  let interrupted = false;
  rl.on('SIGINT', () => {
    interrupted = true;
    rl.close();
  });

  print(BANNER);
  rl.setPrompt(PROMPT);
  rl.prompt();

  try {
    for await (const line of rl) {
      try {
        const result = await handleCommand(agent, line);
        print(result.output);
        if (result.exit) break;
      } catch (error) {
        logger.error(`Error in terminal session: ${errorMessage(error)}`);
        print(`Произошла ошибка: ${errorMessage(error)}`);
      }
      rl.prompt();
    }

    if (interrupted) {
      print(`\n\n${GOODBYE}`);
    }
  } finally {
    rl.close();
  }
}
