import { describe, expect, it } from 'vitest';
import { FixedScoresModel, ScriptedModel, scriptedRandom, testConfig } from '../testing/fakeModels.js';
import { ModelServiceError } from '../model/remoteModel.js';
import { GenerationFailedError, OperationAbortedError } from '../utils/errorhandler.js';
import { createSeededRandom } from '../utils/random.js';
import { StorySession } from './orchestrator.js';
import { resolveOutcome } from './rules.js';

const CONTEXT = 'You are a knight.';
const PROMPT = 'You stand before a door.';

const CORPUS = [
  CONTEXT,
  PROMPT,
  'The door opens.',
  'A cold wind blows in.',
  'The wind howls.',
  'Nothing happens.',
  'You wait. > You look around.',
  'The troll swings and you die.',
];

function setup(draw = 0.5, env: Record<string, string> = {}) {
  const model = new ScriptedModel(CORPUS).queueText('The door opens.');
  const session = new StorySession({ model, config: testConfig(env), rng: scriptedRandom(draw), seed: 'test-seed' });
  return { model, session };
}

async function started(draw = 0.5, env: Record<string, string> = {}) {
  const fixture = setup(draw, env);
  await fixture.session.start(CONTEXT, PROMPT);
  return fixture;
}

describe('StorySession', () => {
  it('opens the story from the context and prompt', async () => {
    const { model, session } = setup();

    expect(await session.start(CONTEXT, PROMPT)).toBe('You stand before a door. The door opens.');
    expect(model.contexts[0]).toEqual(model.encode(`${CONTEXT}\n${PROMPT}`));
    expect(session.started).toBe(true);
  });

  it('rolls for an action and frames it by the outcome', async () => {
    const { model, session } = await started(0.5);
    model.queueText('A cold wind blows in.');

    const turn = await session.act('open the door');

    expect(turn).toEqual({
      action: 'You open the door.',
      outcome: { roll: 11, tier: 'success' },
      result: 'A cold wind blows in.',
      looped: false,
      verdict: null,
    });
    expect(session.toString()).toBe(
      'You stand before a door. The door opens.\n> You open the door.\nA cold wind blows in.'
    );
  });

  it('shows the model a failed attempt on a low roll', async () => {
    const { model, session } = await started(0);
    model.queueText('Nothing happens.');

    const turn = await session.act('I open the door.');

    expect(turn.outcome).toEqual({ roll: 1, tier: 'critical-failure' });
    expect(turn.action).toBe('You try to open the door, but fail miserably.');
    // the final call sees the prompt plus everything generated for the turn
    expect(model.contexts[model.contexts.length - 1]).toEqual(model.encode(`${CONTEXT}\n${session.toString()}`));
  });

  it('skips the roll when dice are off', async () => {
    const { model, session } = await started(0, { DICE_ENABLED: 'off' });
    model.queueText('The door opens.');

    const turn = await session.act('open the door');

    expect(turn.outcome).toBeNull();
    expect(turn.action).toBe('You open the door.');
  });

  it('never rolls for speech or for continuing', async () => {
    const { model, session } = await started(0);
    model.queueText('The wind howls.', 'Nothing happens.');

    const said = await session.act('"Hello?"');
    const continued = await session.act('');

    expect(said.outcome).toBeNull();
    expect(said.action).toBe('You say "Hello?"');
    expect(continued).toMatchObject({ action: '', outcome: null, result: 'Nothing happens.' });
    expect(session.toString().endsWith('\n> You say "Hello?"\nThe wind howls. Nothing happens.')).toBe(true);
  });

  it('drops a turn that repeats the previous one', async () => {
    const { model, session } = await started();
    model.queueText('The wind howls.', 'The wind howls.');

    await session.act('wait');
    const repeat = await session.act('wait');

    expect(repeat.looped).toBe(true);
    expect(repeat.verdict).toBeNull();
    expect(session.turnCount).toBe(1);
  });

  it('asks again when the model produces nothing', async () => {
    const { model, session } = await started();
    model.queueText('', 'Nothing happens.');

    const turn = await session.act('wait');

    expect(turn.result).toBe('Nothing happens.');
    // 5 calls to open the story, 1 for the empty attempt, 4 for the retry
    expect(model.contexts).toHaveLength(10);
    expect(model.contexts[6]).toEqual([...model.contexts[5], model.tokenizer.unknownId]);
  });

  it('cuts the text where the model starts acting for the player', async () => {
    const { model, session } = await started();
    model.queueText('You wait. > You look around.');

    expect((await session.act('wait')).result).toBe('You wait.');
  });

  it('reports a death', async () => {
    const { model, session } = await started();
    model.queueText('The troll swings and you die.');

    expect((await session.act('attack the troll')).verdict).toBe('died');
  });

  it('retries a turn after a transient model failure', async () => {
    const { model, session } = await started();
    model.failWith(new Error('connection reset')).queueText('The wind howls.');

    expect((await session.act('wait')).result).toBe('The wind howls.');
  });

  it('does not retry a failure the model service rejected outright', async () => {
    const { model, session } = setup();
    model.failWith(new ModelServiceError('bad request', 400), 3);

    await expect(session.start(CONTEXT, PROMPT)).rejects.toBeInstanceOf(GenerationFailedError);
    expect(model.contexts).toHaveLength(1);
    expect(session.started).toBe(false);
  });

  it('leaves the story alone when a turn is cancelled', async () => {
    const { session } = await started();
    const controller = new AbortController();
    controller.abort();

    await expect(session.act('wait', controller.signal)).rejects.toBeInstanceOf(OperationAbortedError);
    expect(session.turnCount).toBe(0);
  });

  it('reverts turns one at a time', async () => {
    const { model, session } = await started();
    model.queueText('The wind howls.', 'Nothing happens.');
    await session.act('wait');
    await session.act('listen');

    expect(session.revert()).toBe('The wind howls.');
    expect(session.revert()).toBe('You stand before a door. The door opens.');
    expect(session.revert()).toBeNull();
  });

  it('restores a snapshot', async () => {
    const { model, session } = await started();
    model.queueText('The wind howls.');
    await session.act('wait');
    const snapshot = session.snapshot();

    const { session: other } = setup();
    other.restore(snapshot);

    expect(other.toString()).toBe(session.toString());
    expect(other.snapshot()).toEqual({ ...snapshot, seed: 'test-seed' });
  });

  it('continues a restored story from its saved seed', async () => {
    const { session } = setup();
    session.restore({ context: CONTEXT, storyStart: PROMPT, actions: [], results: [], seed: 'saved-seed' });

    const turn = await session.act('wait');

    expect(session.seed).toBe('saved-seed');
    expect(turn.outcome).toEqual(resolveOutcome(true, createSeededRandom('saved-seed'), testConfig().dice.tiers));
  });

  it('applies reloaded settings from the next turn', async () => {
    const { model, session } = await started(0.5);

    expect(session.replaceConfig(testConfig())).toBe(false);
    expect(session.replaceConfig(testConfig({ DICE_ENABLED: 'off' }))).toBe(true);

    model.queueText('The wind howls.');
    expect((await session.act('wait')).outcome).toBeNull();
  });

  it('suggests actions from the current story', async () => {
    const model = new FixedScoresModel(['<eos>', 'look'], [0, 1]);
    const session = new StorySession({
      model,
      config: testConfig({ SUGGESTION_COUNT: '2', SUGGESTION_MAX_TOKENS: '2' }),
      rng: scriptedRandom(0.5),
      seed: 'test-seed',
    });
    session.restore({ context: '', storyStart: 'look', actions: [], results: [], seed: 'test-seed' });

    const result = await session.suggest();

    expect(result.candidates.map((candidate) => candidate.text)).toEqual(['look look', 'look look']);
    expect(model.calls[0]).toEqual([1]);
  });

  it('suggests nothing when suggestions are off', async () => {
    const { model, session } = await started();
    const calls = model.contexts.length;

    expect(await session.suggest()).toEqual({ candidates: [], requested: 0, shortfall: 0, cancelled: false });
    expect(model.contexts).toHaveLength(calls);
  });
});
