import { describe, expect, it } from 'vitest';

import {
  blockedList,
  blockedTerms,
  evaluateDeterministic,
  maxLength,
  noBrackets,
  noLongWords,
  noSlashes,
} from '../../src/evaluation/deterministic.js';
import { ConfigurationError } from '../../src/utils/errors.js';

describe('maxLength', () => {
  const evaluation = maxLength({ field: 'title', maxChars: 5 });

  it('describes its limit', () => {
    expect(evaluation.requirement).toBe('Has at most 5 characters');
  });

  it('passes at the limit', () => {
    expect(evaluateDeterministic(evaluation, { title: 'abcde' })).toEqual({
      field: 'title',
      requirement: 'Has at most 5 characters',
      result: 'PASS',
      reason: '',
    });
  });

  it('reports the actual length when over the limit', () => {
    expect(evaluateDeterministic(evaluation, { title: 'abcdef' })).toEqual({
      field: 'title',
      requirement: 'Has at most 5 characters',
      result: 'FAIL',
      reason: 'Should have at most 5 chars, but has 6',
    });
  });

  it('counts astral characters once', () => {
    expect(evaluateDeterministic(evaluation, { title: '😀😀😀😀😀' }).result).toBe('PASS');
    expect(evaluateDeterministic(evaluation, { title: '😀😀😀😀😀😀' }).reason).toBe(
      'Should have at most 5 chars, but has 6',
    );
  });

  it('defaults to fifty characters', () => {
    expect(maxLength({ field: 'title' }).maxChars).toBe(50);
  });

  it('treats a missing field as empty text', () => {
    expect(evaluateDeterministic(evaluation, {}).result).toBe('PASS');
  });

  it('gives the same result for the same inputs', () => {
    const inputs = { title: 'abcdefgh' };
    expect(evaluateDeterministic(evaluation, inputs)).toEqual(
      evaluateDeterministic(evaluation, inputs),
    );
  });
});

describe('noBrackets', () => {
  it('lists every bracketed placeholder', () => {
    const result = evaluateDeterministic(noBrackets({ field: 'body' }), {
      body: 'Hello [name] and [x]',
    });
    expect(result.result).toBe('FAIL');
    expect(result.reason).toBe('Should not contain square brackets: [name], [x]');
  });

  it('passes plain text', () => {
    expect(evaluateDeterministic(noBrackets({ field: 'body' }), { body: 'Hello' }).result).toBe(
      'PASS',
    );
  });
});

describe('noSlashes', () => {
  it('flags word/word constructions', () => {
    const result = evaluateDeterministic(noSlashes({ field: 'title' }), {
      title: 'Pick and/or skip',
    });
    expect(result.reason).toBe('`title` should not contain slash constructions: and/or');
  });

  it('flags constructions with accented letters', () => {
    const result = evaluateDeterministic(noSlashes({ field: 'title' }), {
      title: 'Un café/thé',
    });
    expect(result.reason).toBe('`title` should not contain slash constructions: café/thé');
  });

  it('passes text without slashes', () => {
    expect(
      evaluateDeterministic(noSlashes({ field: 'title' }), { title: 'Pick one' }).result,
    ).toBe('PASS');
  });
});

describe('blockedTerms', () => {
  const evaluation = blockedTerms({ field: 'title', terms: ['Banana', 'ice cream'] });

  it('describes the blocked terms', () => {
    expect(evaluation.requirement).toBe(
      'Does not contain any of the following terms: Banana, ice cream',
    );
  });

  it('matches single words as whole words only', () => {
    expect(evaluateDeterministic(evaluation, { title: 'Fresh bananas' }).result).toBe('PASS');
  });

  it('ignores case and edge punctuation', () => {
    expect(evaluateDeterministic(evaluation, { title: 'BANANA!' }).reason).toBe(
      'Should not contain the blocked terms: Banana',
    );
  });

  it('keeps accented letters when stripping edge punctuation', () => {
    const result = evaluateDeterministic(blockedTerms({ field: 'title', terms: ['café'] }), {
      title: 'Meet at the café.',
    });
    expect(result.reason).toBe('Should not contain the blocked terms: café');
  });

  it('matches multi-word terms as substrings', () => {
    expect(
      evaluateDeterministic(evaluation, { title: 'I like bananas and Ice Cream.' }).reason,
    ).toBe('Should not contain the blocked terms: ice cream');
  });

  it('reads extra terms from another field', () => {
    const fromField = blockedTerms({ field: 'title', termsField: 'avoid' });
    expect(fromField.requirement).toBe('Does not contain any of the following terms: {{avoid}}');

    const result = evaluateDeterministic(fromField, {
      title: 'Fresh apple pie',
      avoid: 'apple, pear\nplum',
    });
    expect(result.reason).toBe('Should not contain the blocked terms: apple');
  });

  it('accepts a list-valued terms field', () => {
    const fromField = blockedTerms({ field: 'title', termsField: 'avoid' });
    expect(
      evaluateDeterministic(fromField, { title: 'Plum jam', avoid: ['plum'] }).result,
    ).toBe('FAIL');
  });

  it('needs terms or a terms field', () => {
    expect(() => blockedTerms({ field: 'title' })).toThrow(ConfigurationError);
  });
});

describe('blockedList', () => {
  const evaluation = blockedList({ field: 'title', values: ['Hello World'] });

  it('rejects a value equal to a blocked one after trimming and lowercasing', () => {
    expect(evaluateDeterministic(evaluation, { title: '  hello world ' })).toEqual({
      field: 'title',
      requirement: 'Is not identical to any of the following blocked values: Hello World',
      result: 'FAIL',
      reason: "'hello world' is one of the blocked values",
    });
  });

  it('passes values that only contain a blocked one', () => {
    expect(evaluateDeterministic(evaluation, { title: 'Hello World Again' }).result).toBe('PASS');
  });

  it('needs values or a values field', () => {
    expect(() => blockedList({ field: 'title' })).toThrow(ConfigurationError);
  });
});

describe('noLongWords', () => {
  it('lists the words over the limit', () => {
    const result = evaluateDeterministic(noLongWords({ field: 'body', maxChars: 5 }), {
      body: 'short extraordinary words',
    });
    expect(result.reason).toBe(
      'The following words have more than 5 characters: extraordinary',
    );
  });

  it('counts astral characters once per word', () => {
    const evaluation = noLongWords({ field: 'body', maxChars: 3 });
    expect(evaluateDeterministic(evaluation, { body: '😀😀😀 ok' }).result).toBe('PASS');
    expect(evaluateDeterministic(evaluation, { body: '😀😀😀😀' }).reason).toBe(
      'The following words have more than 3 characters: 😀😀😀😀',
    );
  });

  it('defaults to ten characters', () => {
    expect(noLongWords({ field: 'body' }).requirement).toBe(
      'Contains no words with more than 10 characters',
    );
  });
});
