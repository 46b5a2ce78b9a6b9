import { ResponseValidator } from './response.validator';
import { buildMcqReply } from './testing/quiz.fixtures';

const validItem = {
  mcq: 'Which gas do plants release?',
  options: { a: 'Nitrogen', b: 'Oxygen', c: 'Helium', d: 'Argon' },
  correct: 'b',
};

const withItem = (item: unknown): string =>
  JSON.stringify({ mcqs: [validItem, item] });

describe('ResponseValidator', () => {
  const validator = new ResponseValidator();

  it('turns a well-formed reply into questions', () => {
    const result = validator.validate(JSON.stringify({ mcqs: [validItem] }));

    expect(result).toEqual({
      ok: true,
      questions: [
        {
          text: 'Which gas do plants release?',
          options: { a: 'Nitrogen', b: 'Oxygen', c: 'Helium', d: 'Argon' },
          correctKey: 'b',
        },
      ],
    });
  });

  it('returns frozen questions', () => {
    const result = validator.validate(buildMcqReply('a', 'b', 'c'));
    if (!result.ok) {
      throw new Error(result.failure.detail);
    }
    expect(Object.isFrozen(result.questions)).toBe(true);
    expect(Object.isFrozen(result.questions[0])).toBe(true);
    expect(Object.isFrozen(result.questions[0].options)).toBe(true);
  });

  it('trims surrounding whitespace from texts', () => {
    const result = validator.validate(
      withItem({ ...validItem, mcq: '  Padded?  ' }),
    );
    expect(result.ok && result.questions[1].text).toBe('Padded?');
  });

  it('treats a reply wrapped in a json code fence as malformed', () => {
    const result = validator.validate(
      '```json\n' + JSON.stringify({ mcqs: [validItem] }) + '\n```',
    );
    expect(!result.ok && result.failure.kind).toBe('MalformedJSON');
  });

  it('ignores extra fields on questions', () => {
    const result = validator.validate(
      withItem({ ...validItem, explanation: 'Plants exhale oxygen.' }),
    );
    expect(result.ok).toBe(true);
  });

  it('accepts counts other than three', () => {
    const result = validator.validate(buildMcqReply('a', 'b', 'c', 'd'));
    expect(result.ok && result.questions.length).toBe(4);
  });

  it.each([
    'not json at all',
    '{"mcqs": [',
    '',
    "{'mcqs': []}",
  ])('reports MalformedJSON for %j without throwing', (raw) => {
    const result = validator.validate(raw);
    expect(result.ok).toBe(false);
    expect(!result.ok && result.failure.kind).toBe('MalformedJSON');
  });

  it.each([
    ['no mcqs key', '{"questions": []}'],
    ['mcqs not an array', '{"mcqs": {"a": 1}}'],
    ['top-level array', '[]'],
    ['top-level null', 'null'],
    ['empty mcqs', '{"mcqs": []}'],
  ])('reports SchemaMismatch for %s', (_label, raw) => {
    const result = validator.validate(raw);
    expect(!result.ok && result.failure.kind).toBe('SchemaMismatch');
  });

  it('rejects the whole batch when one item misses an option', () => {
    const result = validator.validate(
      withItem({
        ...validItem,
        options: { a: 'Nitrogen', b: 'Oxygen', c: 'Helium' },
      }),
    );

    expect(result).toEqual({
      ok: false,
      failure: {
        kind: 'SchemaMismatch',
        detail:
          'mcqs.1.options must have exactly the keys a, b, c, d (got a, b, c)',
      },
    });
  });

  it('rejects options with an extra key', () => {
    const result = validator.validate(
      withItem({
        ...validItem,
        options: { ...validItem.options, e: 'Neon' },
      }),
    );
    expect(!result.ok && result.failure.kind).toBe('SchemaMismatch');
  });

  it('rejects a correct key outside a-d', () => {
    const result = validator.validate(withItem({ ...validItem, correct: 'e' }));

    expect(!result.ok && result.failure.kind).toBe('SchemaMismatch');
    expect(!result.ok && result.failure.detail).toContain('mcqs.1.correct');
  });

  it('rejects blank question text', () => {
    const result = validator.validate(withItem({ ...validItem, mcq: '   ' }));

    expect(!result.ok && result.failure.detail).toBe(
      'mcqs.1.mcq: mcq should not be empty',
    );
  });

  it('rejects empty or non-string option texts', () => {
    const empty = validator.validate(
      withItem({ ...validItem, options: { ...validItem.options, a: '' } }),
    );
    const numeric = validator.validate(
      withItem({ ...validItem, options: { ...validItem.options, d: 4 } }),
    );

    expect(!empty.ok && empty.failure.detail).toContain('mcqs.1.options.a');
    expect(!numeric.ok && numeric.failure.detail).toContain(
      'mcqs.1.options.d',
    );
  });

  it('rejects items that are not objects', () => {
    const result = validator.validate(withItem('just a string'));
    expect(!result.ok && result.failure.detail).toBe(
      'mcqs.1 must be an object',
    );
  });
});
