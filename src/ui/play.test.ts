import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { AppConfig } from '../config.js';
import { StorySession } from '../engine/orchestrator.js';
import { openDatabase, type StoryDatabase } from '../persistence/db.js';
import { StoryStore } from '../persistence/stories.js';
import { ScriptedModel, scriptedRandom, testConfig } from '../testing/fakeModels.js';
import { InvalidConfigError } from '../utils/errorhandler.js';
import type { ColorName, ConsoleIO } from './console.js';
import { GameShell, LOOP_MESSAGE } from './play.js';

class ScriptedConsole implements ConsoleIO {
  readonly output: Array<{ text: string; color: ColorName }> = [];

  constructor(private readonly answers: string[]) {}

  print(text: string, color: ColorName = 'default') {
    this.output.push({ text, color });
  }

  async ask(question: string): Promise<string> {
    const answer = this.answers.shift();
    if (answer === undefined) throw new Error(`No scripted answer for "${question}"`);
    return answer;
  }

  bell() {}

  onInterrupt(): () => void {
    return () => undefined;
  }

  close() {}

  printed(color: ColorName): string[] {
    return this.output.filter((line) => line.color === color).map((line) => line.text);
  }
}

const CORPUS = [
  'You are a knight.',
  'You stand before a door.',
  'The door opens.',
  'A cold wind blows in.',
  'The wind howls.',
  'open the door',
  'The troll swings and you die.',
];

describe('GameShell', () => {
  let root: string;
  let db: StoryDatabase;
  let store: StoryStore;
  let model: ScriptedModel;

  beforeEach(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'play-test-'));
    db = openDatabase(':memory:');
    store = new StoryStore(db);
    model = new ScriptedModel(CORPUS);
  });

  afterEach(() => {
    db.close();
    fs.removeSync(root);
  });

  function shell(answers: string[], env: Record<string, string> = {}, reload?: () => AppConfig) {
    const io = new ScriptedConsole(answers);
    const session = new StorySession({
      model,
      config: testConfig({ CONTENT_ROOT: root, ...env }),
      rng: scriptedRandom(0.5),
      seed: 'test-seed',
    });
    return { io, session, game: new GameShell({ io, session, store, reload }) };
  }

  it('plays a custom story through a turn and saves it', async () => {
    model.queueText('The door opens.', 'A cold wind blows in.');
    const { io, game } = shell(['1', 'You are a knight.', 'You stand before a door.', '', 'open the door', 'print', 'save', 'quit']);

    await game.run();

    expect(io.printed('ai-text')).toEqual([
      'You are a knight.',
      'You stand before a door. The door opens.',
      'A cold wind blows in.',
    ]);
    expect(io.printed('dice')).toEqual(['d20: 11 (success)']);
    expect(io.printed('user-text')).toEqual(['You open the door.']);
    expect(io.printed('print-story')).toEqual([
      'You stand before a door. The door opens.\n> You open the door.\nA cold wind blows in.',
    ]);

    const [saved] = store.list();
    expect(saved.preview).toBe('You stand before a door. The door opens.');
    expect(io.printed('message')).toEqual([`Story saved. Load it again with "load ${saved.story_id}".`, 'Goodbye.']);
  });

  it('starts from a prompt file and handles bad input', async () => {
    fs.outputFileSync(path.join(root, 'prompts', 'fantasy', 'knight.txt'), 'You are a knight.\nYou stand before a door.\n');
    fs.outputFileSync(path.join(root, 'interface', 'instructions.txt'), 'Type what you do.');
    model.queueText('The door opens.');
    const { io, game } = shell(['9', '0', '', 'revert', '4', 'restart', '3']);

    await game.run();

    expect(io.printed('menu')).toContain('0) fantasy/knight');
    expect(io.printed('instructions')).toEqual(['Type what you do.']);
    expect(io.printed('error')).toEqual([
      'Please enter a number from 0 to 3.',
      "You can't go back any further.",
      'There is no suggestion with that number.',
    ]);
    expect(io.printed('ai-text')).toEqual(['You are a knight.', 'You stand before a door. The door opens.']);
  });

  it('tells the player when no suggestions came up', async () => {
    model.queueText('The door opens.');
    const { io, game } = shell(['1', '', 'You stand before a door.', '', 'quit'], { SUGGESTION_COUNT: '1' });

    await game.run();

    expect(io.printed('message')).toEqual(['No suggestions came up this turn. Type "retry" to ask again.', 'Goodbye.']);
    expect(io.printed('menu').some((menu) => menu.startsWith('Options:'))).toBe(false);
  });

  it('offers suggestions and takes one by number', async () => {
    model.queueText('The door opens.', 'open the door', 'A cold wind blows in.');
    const { io, game } = shell(['1', '', 'You stand before a door.', '', '0', 'quit'], { SUGGESTION_COUNT: '1' });

    await game.run();

    expect(io.printed('menu')).toContain('Options:\n0) open the door');
    expect(io.printed('user-text')).toEqual(['You open the door.']);
    expect(io.printed('ai-text')).toEqual(['You stand before a door. The door opens.', 'A cold wind blows in.']);
  });

  it('warns when an action makes the story loop', async () => {
    model.queueText('The door opens.', 'The wind howls.', 'The wind howls.');
    const { io, game } = shell(['1', '', 'You stand before a door.', '', 'wait', 'wait', 'quit']);

    await game.run();

    expect(io.printed('message')).toEqual([LOOP_MESSAGE, 'Goodbye.']);
  });

  it('ends the story on a death unless the player keeps going', async () => {
    model.queueText('The door opens.', 'The troll swings and you die.');
    const { io, game } = shell(['1', '', 'You stand before a door.', '', 'attack the troll', '0', '3']);

    await game.run();

    expect(io.printed('title')).toContain('YOU DIED. GAME OVER');
    expect(io.printed('menu').filter((menu) => menu.startsWith('0) Pick a prompt'))).toHaveLength(2);
  });

  it('reloads settings between turns', async () => {
    model.queueText('The door opens.', 'A cold wind blows in.');
    let reloads = 0;
    const reload = () => {
      reloads++;
      if (reloads === 1) throw new InvalidConfigError('temperature', 'must be greater than 0', { envVar: 'TEMPERATURE' });
      return testConfig({ CONTENT_ROOT: root, DICE_ENABLED: 'off' });
    };
    const { io, game } = shell(['1', '', 'You stand before a door.', '', 'reload', 'reload', 'reload', 'open the door', 'quit'], {}, reload);

    await game.run();

    expect(io.printed('error')).toEqual(['Invalid setting TEMPERATURE: must be greater than 0']);
    expect(io.printed('message')).toEqual(['Settings reloaded.', 'Settings are unchanged.', 'Goodbye.']);
    expect(io.printed('dice')).toEqual([]);
  });

  it('loads a saved story from the start menu', async () => {
    const id = store.save({
      context: 'You are a knight.',
      storyStart: 'You stand before a door. The door opens.',
      actions: ['\n> You open the door.\n'],
      results: ['A cold wind blows in.'],
      seed: 'test-seed',
    });
    const { io, session, game } = shell(['2', id, 'load story_missing', 'quit']);

    await game.run();

    expect(session.turnCount).toBe(1);
    expect(io.printed('ai-text')).toEqual([
      'You stand before a door. The door opens.\n> You open the door.\nA cold wind blows in.',
    ]);
    expect(io.printed('error')).toEqual(['No saved story with id story_missing.']);
  });
});
