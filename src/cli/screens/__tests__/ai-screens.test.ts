/**
 * Tests for the AI Helper, AI Quiz and AI Chat screens
 */

import { describe, it, expect } from 'vitest';
import type { QuizQuestion } from '../../../database/schema.js';
import { AIServiceError, MissingAPIKeyError, NetworkError } from '../../../errors/index.js';
import { createScreenHarness } from '../../../test-utils/index.js';
import { parseChoice } from '../ai-quiz.js';
import { formatTranscript } from '../ai-chat.js';

const QUESTIONS: QuizQuestion[] = [
  {
    question: 'What is the powerhouse of the cell?',
    choices: ['Mitochondria', 'Nucleus', 'Ribosome', 'Golgi body'],
    correctIndex: 0,
    explanation: 'It makes most of the ATP.',
  },
  {
    question: 'Which organelle holds the DNA?',
    choices: ['Vacuole', 'Nucleus', 'Lysosome', 'Cell wall'],
    correctIndex: 1,
    explanation: '',
  },
];

describe('AI helper screen', () => {
  it('shows the answer and saves it to the Review Hub', async () => {
    const harness = await createScreenHarness(['3', 'explain', 'Photosynthesis', 'y']);
    harness.gateway.reply('Plants turn light into sugar.');

    await harness.run();

    expect(harness.gateway.asks).toEqual([{ prompt: 'Photosynthesis', mode: 'explain' }]);
    expect(harness.term.spinners).toEqual(['Asking Gemini... (Ctrl+C to stop waiting)']);
    expect(harness.term.output.slice(-4)).toEqual([
      '',
      'Plants turn light into sugar.',
      '',
      'Saved as "Explanation: Photosynthesis".',
    ]);
    expect(harness.repository().aiContent.list()).toMatchObject([
      { kind: 'explanation', prompt: 'Photosynthesis', responseText: 'Plants turn light into sugar.' },
    ]);
  });

  it('does not save when declined', async () => {
    const harness = await createScreenHarness(['3', 'summarize', 'Chapter 2 notes', 'n']);
    harness.gateway.reply('Key points.');

    await harness.run();

    expect(harness.gateway.asks).toEqual([{ prompt: 'Chapter 2 notes', mode: 'summarize' }]);
    expect(harness.repository().aiContent.list()).toEqual([]);
  });

  it('points to Settings when no API key is saved', async () => {
    const harness = await createScreenHarness(['3', 'questions', 'Fractions']);
    harness.gateway.reply(new MissingAPIKeyError());

    await harness.run();

    expect(harness.term.output.slice(-2)).toEqual([
      'Gemini API key not configured',
      'Open Settings from the main menu and save your Gemini API key',
    ]);
    expect(harness.term.prompts.at(-1)).toBe('helper> ');
  });

  it('shows network failures as a dialog and stays on the screen', async () => {
    const harness = await createScreenHarness(['3', 'explain', 'Gravity']);
    harness.gateway.reply(new NetworkError('Could not reach Gemini: fetch failed'));

    await harness.run();

    expect(harness.lines().slice(-4)).toEqual([
      '',
      'Error: Could not reach Gemini: fetch failed',
      'Hint: Check your internet connection and try again',
      '',
    ]);
    expect(harness.term.prompts.at(-1)).toBe('helper> ');
  });

  it('stops waiting on Ctrl+C', async () => {
    const harness = await createScreenHarness(['3', 'explain', 'Gravity'], { terminal: { interruptOnSpin: true } });
    harness.gateway.reply('hang');

    await harness.run();

    expect(harness.term.output.at(-1)).toBe('Stopped waiting for the AI response');
    expect(harness.term.prompts.at(-1)).toBe('helper> ');
    expect(harness.repository().aiContent.list()).toEqual([]);
  });
});

describe('AI quiz screen', () => {
  it('parses letters and numbers as choices', () => {
    expect(parseChoice('a')).toBe(0);
    expect(parseChoice(' D ')).toBe(3);
    expect(parseChoice('2')).toBe(1);
    expect(parseChoice('5')).toBeNull();
    expect(parseChoice('')).toBeNull();
    expect(parseChoice('E')).toBeNull();
  });

  it('runs a quiz, scores it and records the answers', async () => {
    const harness = await createScreenHarness(['4', 'new', 'Cells', '2', 'A', '', 'history']);
    harness.gateway.replyQuiz(QUESTIONS);

    await harness.run();
    const lines = harness.lines();

    expect(harness.gateway.quizzes).toEqual([{ topic: 'Cells', count: 2 }]);
    expect(harness.term.prompts.slice(2, 4)).toEqual(['Quiz topic: ', 'Number of questions [5]: ']);

    const first = lines.indexOf('Q1/2 What is the powerhouse of the cell?');
    expect(lines.slice(first, first + 7)).toEqual([
      'Q1/2 What is the powerhouse of the cell?',
      '  A) Mitochondria',
      '  B) Nucleus',
      '  C) Ribosome',
      '  D) Golgi body',
      '✓ Correct',
      'It makes most of the ATP.',
    ]);
    expect(lines).toContain('✗ The answer is B) Nucleus');
    expect(lines).toContain('Score: 1/2 (50%)');
    expect(lines).toContain('│ 1 │ 2024-03-15 10:00 │ Cells │   1/2 │');

    const [result] = harness.repository().quizzes.list();
    expect(result).toMatchObject({ topic: 'Cells', score: 1, totalQuestions: 2 });
    expect(result?.questions.map((q) => q.selectedIndex)).toEqual([0, null]);
  });

  it('uses the configured question count by default', async () => {
    const harness = await createScreenHarness(['4', 'new', 'Cells', '']);
    harness.gateway.replyQuiz(new AIServiceError('Gemini returned no text'));

    await harness.run();

    expect(harness.gateway.quizzes).toEqual([{ topic: 'Cells', count: 5 }]);
    expect(harness.repository().quizzes.list()).toEqual([]);
  });

  it('rejects a count that is not a number', async () => {
    const harness = await createScreenHarness(['4', 'new', 'Cells', 'two']);

    await harness.run();

    expect(harness.term.output.slice(-2)).toEqual(['✗ Invalid quiz request', '  count: Enter a whole number']);
    expect(harness.gateway.quizzes).toEqual([]);
  });
});

describe('AI chat screen', () => {
  it('formats a transcript', () => {
    expect(
      formatTranscript([
        { id: 1, ownerUserId: 1, role: 'user', content: 'Hello', createdAt: '2024-03-15 10:00:00' },
        { id: 2, ownerUserId: 1, role: 'model', content: 'Hi!', createdAt: '2024-03-15 10:00:00' },
      ])
    ).toBe('You: Hello\n\nGemini: Hi!');
  });

  it('sends messages with the stored history and persists the exchange', async () => {
    const harness = await createScreenHarness(['5', 'Next question', '/back']);
    const repository = harness.repository();
    repository.chat.append('user', 'What is a cell?');
    repository.chat.append('model', 'The smallest unit of life.');
    harness.gateway.reply('Ask away.');

    await harness.run();

    expect(harness.term.output).toContain('You: What is a cell?');
    expect(harness.term.output).toContain('Gemini: The smallest unit of life.');
    expect(harness.term.output).toContain('Gemini: Ask away.');
    expect(harness.gateway.chats).toEqual([
      [
        { role: 'user', content: 'What is a cell?' },
        { role: 'model', content: 'The smallest unit of life.' },
        { role: 'user', content: 'Next question' },
      ],
    ]);
    expect(repository.chat.recent(10).map((m) => m.content)).toEqual([
      'What is a cell?',
      'The smallest unit of life.',
      'Next question',
      'Ask away.',
    ]);
    expect(harness.term.prompts).toEqual(['> ', 'you> ', 'you> ', '> ']);
  });

  it('keeps nothing from a failed exchange', async () => {
    const harness = await createScreenHarness(['5', 'Hello']);
    harness.gateway.reply(new AIServiceError('Gemini is overloaded', 503));

    await harness.run();

    expect(harness.lines().slice(-4)).toEqual(['', 'Error: Gemini is overloaded', 'Hint: Try again in a moment', '']);
    expect(harness.repository().chat.recent(10)).toEqual([]);
  });

  it('saves a snapshot and clears the conversation', async () => {
    const harness = await createScreenHarness(['5', '/save', 'Hello', '/save', '/clear', 'y', '/help']);
    harness.gateway.reply('Hi! What are we studying?');

    await harness.run();
    const output = harness.term.output;

    expect(output).toContain('Nothing to save yet.');
    expect(output).toContain('Saved as "Chat: Hello".');
    expect(output).toContain('Cleared 2 message(s).');
    expect(output.at(-1)).toBe('Type a message, or /save, /clear, /back, /help.');
    expect(harness.repository().aiContent.list()).toMatchObject([
      { kind: 'chat_snapshot', prompt: 'Hello', responseText: 'You: Hello\n\nGemini: Hi! What are we studying?' },
    ]);
    expect(harness.repository().chat.recent(10)).toEqual([]);
  });
});
