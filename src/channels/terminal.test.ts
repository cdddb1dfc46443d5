import { PassThrough } from 'stream';
import { describe, expect, it, vi } from 'vitest';
import { BANNER, handleCommand, runTerminalSession, type TerminalAgent } from './terminal.js';

function fakeAgent(): TerminalAgent {
  return {
    writePost: vi.fn(async (request: string) => `пост о ${request}`),
    generateIdeas: vi.fn(async (theme?: string) => `идеи ${theme ?? ''}`.trim()),
    researchTopic: vi.fn(async (topic: string) => `исследование ${topic}`),
  };
}

describe('handleCommand', () => {
  it('generates a post', async () => {
    const agent = fakeAgent();

    expect(await handleCommand(agent, 'пост: зимний вечер')).toEqual({
      output: '\n📝 Сгенерированный пост:\nпост о зимний вечер',
      exit: false,
    });
  });

  it('asks for a topic when the post request is empty', async () => {
    const agent = fakeAgent();

    expect(await handleCommand(agent, 'пост:   ')).toEqual({
      output: "Пожалуйста, укажите тему поста после 'пост:'",
      exit: false,
    });
    expect(agent.writePost).not.toHaveBeenCalled();
  });

  it('generates ideas with or without a theme', async () => {
    const agent = fakeAgent();

    expect((await handleCommand(agent, 'идеи: весна')).output).toBe('\n💡 Идеи для постов:\nидеи весна');
    expect(agent.generateIdeas).toHaveBeenLastCalledWith('весна');

    await handleCommand(agent, 'идеи:');
    expect(agent.generateIdeas).toHaveBeenLastCalledWith('');
  });

  it('researches a topic', async () => {
    const agent = fakeAgent();

    expect((await handleCommand(agent, 'исследование: пчелиный воск')).output).toBe(
      '\n🔍 Результаты исследования:\nисследование пчелиный воск'
    );
    expect((await handleCommand(agent, 'исследование:')).output).toBe(
      "Пожалуйста, укажите тему исследования после 'исследование:'"
    );
  });

  it('exits on a quit word', async () => {
    for (const word of ['выход', 'EXIT', 'quit']) {
      expect(await handleCommand(fakeAgent(), word)).toEqual({ output: 'До свидания! 💋', exit: true });
    }
  });

  it('explains unknown commands', async () => {
    expect((await handleCommand(fakeAgent(), 'привет')).output).toBe(
      "Неизвестная команда. Используйте 'пост:', 'идеи:', 'исследование:' или 'выход'"
    );
  });
});

describe('runTerminalSession', () => {
  it('runs commands until the user quits', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let printed = '';
    output.on('data', (chunk: Buffer) => {
      printed += chunk.toString('utf-8');
    });

    const session = runTerminalSession(fakeAgent(), { input, output });
    input.write('пост: свечи\n');
    input.write('выход\n');
    await session;

    expect(printed.startsWith(`${BANNER}\n`)).toBe(true);
    expect(printed).toContain('\n📝 Сгенерированный пост:\nпост о свечи\n');
    expect(printed).toContain('До свидания! 💋\n');
  });

  it('keeps going after a failed command', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    let printed = '';
    output.on('data', (chunk: Buffer) => {
      printed += chunk.toString('utf-8');
    });
    const agent = fakeAgent();
    vi.mocked(agent.writePost).mockRejectedValueOnce(new Error('Completion failed for post'));

    const session = runTerminalSession(agent, { input, output });
    input.write('пост: свечи\n');
    input.write('пост: воск\n');
    input.write('выход\n');
    await session;

    expect(printed).toContain('Произошла ошибка: Completion failed for post\n');
    expect(printed).toContain('пост о воск\n');
  });
});
