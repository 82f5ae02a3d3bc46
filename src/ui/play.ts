import { reloadConfig, type AppConfig } from '../config.js';
import { loadInstructions, loadPrompts, savePrompt } from '../content/contentLoader.js';
import type { ActionCandidate, StoryId } from '../models.js';
import type { StorySession } from '../engine/orchestrator.js';
import { describeOutcome } from '../engine/rules.js';
import type { StoryStore } from '../persistence/stories.js';
import {
  OperationAbortedError,
  StoryError,
  formatErrorForLogging,
  formatErrorForUser,
} from '../utils/errorhandler.js';
import { logger } from '../utils/logger.js';
import type { ConsoleIO } from './console.js';

export const LOOP_MESSAGE = 'That action caused the model to start looping. Try a different action.';

const TITLE = 'DICE TALES\nAn interactive story that writes itself as you play.';

const START_MENU = [
  '0) Pick a prompt (default)',
  '1) Write a custom prompt',
  '2) Load a saved story',
  '3) Quit',
].join('\n');

const COMMAND_HELP = [
  'Commands:',
  '  restart     start a new story',
  '  quit        leave the game',
  '  help        show this list',
  '  print       print the whole story so far',
  '  revert      undo the last action',
  '  save        save the story',
  '  list        list saved stories',
  '  load <id>   load a saved story',
  '  reload      re-read settings from .env',
  '  retry       suggest different actions',
  '  <number>    take a suggested action',
  'Anything else is your next action. Start with " to say something; leave it blank to let the story continue.',
].join('\n');

type TurnsEnd = 'restart' | 'quit';

export interface GameShellDeps {
  io: ConsoleIO;
  session: StorySession;
  store: StoryStore;
  /** Called by the reload command; defaults to re-reading .env. */
  reload?: () => AppConfig;
}

export class GameShell {
  private readonly io: ConsoleIO;
  private readonly session: StorySession;
  private readonly store: StoryStore;
  private readonly reload: () => AppConfig;
  private storyId: StoryId | undefined;
  private suggestions: ActionCandidate[] = [];

  constructor(deps: GameShellDeps) {
    this.io = deps.io;
    this.session = deps.session;
    this.store = deps.store;
    this.reload = deps.reload ?? (() => reloadConfig());
  }

  async run(): Promise<void> {
    this.io.print(TITLE, 'title');
    while (true) {
      const ready = await this.beginStory();
      if (!ready) break;
      const next = await this.playTurns();
      if (next === 'quit') break;
    }
    this.io.print('Goodbye.', 'message');
  }

  private get contentRoot(): string {
    return this.session.getConfig().contentRoot;
  }

  /** Returns false when the player chose to quit. */
  private async beginStory(): Promise<boolean> {
    while (true) {
      const choice = await this.chooseNumber(START_MENU, 3, 0);
      if (choice === 3) return false;

      if (choice === 2) {
        if (await this.loadFromMenu()) return true;
        continue;
      }

      const picked = choice === 0 ? await this.pickPrompt() : null;
      const { context, prompt } = picked ?? (await this.writePrompt());

      const instructions = loadInstructions(this.contentRoot);
      if (instructions) this.io.print(instructions, 'instructions');
      this.io.print('Generating story...', 'loading-message');

      const opening = await this.guard((signal) => this.session.start(context, prompt, signal));
      if (opening === undefined) continue;

      this.storyId = undefined;
      if (context) this.io.print(context, 'ai-text');
      this.io.print(opening, 'ai-text');
      return true;
    }
  }

  private async pickPrompt(): Promise<{ context: string; prompt: string } | null> {
    const prompts = loadPrompts(this.contentRoot);
    if (prompts.length === 0) {
      this.io.print('No prompts found, write your own.', 'message');
      return null;
    }
    const menu = prompts.map((entry, index) => `${index}) ${entry.category}/${entry.name}`).join('\n');
    const index = await this.chooseNumber(menu, prompts.length - 1, 0);
    const { context, prompt } = prompts[index];
    return { context, prompt };
  }

  private async writePrompt(): Promise<{ context: string; prompt: string }> {
    this.io.print('Describe who and where you are, then how the story begins.', 'instructions');
    const context = (await this.io.ask('Context: ', 'query')).trim();
    const prompt = (await this.io.ask('Opening: ', 'query')).trim();
    const name = (await this.io.ask('Save it as (blank to skip): ', 'query')).trim();
    if (name) {
      const saved = savePrompt(this.contentRoot, name, context, prompt);
      this.io.print(saved ? `Prompt saved to ${saved}` : 'That name cannot be used, the prompt was not saved.', 'message');
    }
    return { context, prompt };
  }

  private async loadFromMenu(): Promise<boolean> {
    if (!this.printStoryList()) return false;
    const storyId = (await this.io.ask('Story id (blank to go back): ', 'query')).trim();
    return storyId ? this.loadStory(storyId) : false;
  }

  private printStoryList(): boolean {
    const stories = this.store.list();
    if (stories.length === 0) {
      this.io.print('There are no saved stories yet.', 'message');
      return false;
    }
    this.io.print(stories.map((story) => `${story.story_id}  ${story.preview}`).join('\n'), 'menu', false);
    return true;
  }

  private async playTurns(): Promise<TurnsEnd> {
    await this.refreshSuggestions();

    while (true) {
      this.io.bell();
      const input = (await this.io.ask('> ', 'main-prompt')).trim();
      const command = input.toLowerCase();

      if (command === 'restart') return 'restart';
      if (command === 'quit') return 'quit';
      if (command === 'help') {
        this.io.print(COMMAND_HELP, 'instructions', false);
        continue;
      }
      if (command === 'print') {
        this.io.print(this.session.toString(), 'print-story');
        continue;
      }
      if (command === 'revert') {
        await this.revert();
        continue;
      }
      if (command === 'save') {
        this.save();
        continue;
      }
      if (command === 'list') {
        this.printStoryList();
        continue;
      }
      if (command === 'reload') {
        this.reloadSettings();
        continue;
      }
      if (command === 'retry') {
        await this.refreshSuggestions();
        continue;
      }

      const load = /^load\s+(\S+)$/i.exec(input);
      if (load) {
        if (this.loadStory(load[1])) await this.refreshSuggestions();
        continue;
      }

      let action = input;
      if (/^\d+$/.test(input)) {
        const picked = this.suggestions[Number(input)];
        if (!picked) {
          this.io.print('There is no suggestion with that number.', 'error');
          continue;
        }
        action = picked.text;
      }

      const end = await this.takeTurn(action);
      if (end) return end;
    }
  }

  private async takeTurn(action: string): Promise<TurnsEnd | null> {
    const turn = await this.guard((signal) => this.session.act(action, signal));
    if (!turn) return null;

    if (turn.outcome) this.io.print(describeOutcome(turn.outcome), 'dice');
    if (turn.looped) {
      this.io.print(LOOP_MESSAGE, 'message');
      return null;
    }
    if (turn.action) this.io.print(turn.action, 'user-text');
    this.io.print(turn.result, 'ai-text');

    if (turn.verdict === 'won') {
      this.io.print('CONGRATULATIONS, YOU WON!', 'title');
      return 'restart';
    }
    if (turn.verdict === 'died') {
      this.io.print('YOU DIED. GAME OVER', 'title');
      const choice = await this.chooseNumber('0) Start a new story\n1) "I\'m not dead yet!" (keep playing)', 1, 0);
      if (choice === 0) return 'restart';
    }

    await this.refreshSuggestions();
    return null;
  }

  private async revert() {
    const last = this.session.revert();
    if (last === null) {
      this.io.print("You can't go back any further.", 'error');
      return;
    }
    this.io.print('Last action reverted.', 'message');
    this.io.print(last, 'ai-text');
    await this.refreshSuggestions();
  }

  private save() {
    try {
      this.storyId = this.store.save(this.session.snapshot(), this.storyId);
      this.io.print(`Story saved. Load it again with "load ${this.storyId}".`, 'message');
    } catch (error) {
      this.report(error);
    }
  }

  private loadStory(storyId: StoryId): boolean {
    try {
      const saved = this.store.load(storyId);
      if (!saved) {
        this.io.print(`No saved story with id ${storyId}.`, 'error');
        return false;
      }
      this.session.restore(saved);
      this.storyId = saved.story_id;
      this.io.print(this.session.toString(), 'ai-text');
      return true;
    } catch (error) {
      this.report(error);
      return false;
    }
  }

  private reloadSettings() {
    try {
      const changed = this.session.replaceConfig(this.reload());
      this.io.print(changed ? 'Settings reloaded.' : 'Settings are unchanged.', 'message');
    } catch (error) {
      this.report(error);
    }
  }

  private async refreshSuggestions() {
    this.suggestions = [];
    if (this.session.getConfig().suggestions.count === 0) return;

    this.io.print('Thinking of actions...', 'loading-message');
    const result = await this.guard((signal) => this.session.suggest(signal));
    if (!result) return;
    this.suggestions = result.candidates;
    if (result.shortfall > 0 && !result.cancelled) {
      this.io.print(
        this.suggestions.length === 0
          ? 'No suggestions came up this turn. Type "retry" to ask again.'
          : `Only ${this.suggestions.length} of ${result.requested} suggestions came up.`,
        'message'
      );
    }
    if (this.suggestions.length === 0) return;
    const menu = this.suggestions.map((candidate, index) => `${index}) ${candidate.text}`).join('\n');
    this.io.print(`Options:\n${menu}`, 'menu', false);
  }

  private async chooseNumber(menu: string, max: number, fallback: number): Promise<number> {
    this.io.print(menu, 'menu', false);
    while (true) {
      const answer = (await this.io.ask('Enter a number: ', 'selection-prompt')).trim();
      if (!answer) return fallback;
      const value = Number(answer);
      if (Number.isInteger(value) && value >= 0 && value <= max) return value;
      this.io.print(`Please enter a number from 0 to ${max}.`, 'error');
    }
  }

  /** Runs `task` with a Ctrl+C-abortable signal; reports story errors and returns undefined for them. */
  private async guard<T>(task: (signal: AbortSignal) => Promise<T>): Promise<T | undefined> {
    const controller = new AbortController();
    const release = this.io.onInterrupt(() => controller.abort(new OperationAbortedError('interrupted')));
    try {
      return await task(controller.signal);
    } catch (error) {
      if (error instanceof StoryError) {
        this.report(error);
        return undefined;
      }
      throw error;
    } finally {
      release();
    }
  }

  private report(error: unknown) {
    if (!(error instanceof StoryError)) throw error;
    if (!(error instanceof OperationAbortedError)) {
      logger.warn('Turn failed', formatErrorForLogging(error));
    }
    this.io.print(formatErrorForUser(error), 'error');
  }
}
