import { EmptyInputRejectedError } from './errors/quiz.errors';
import { PromptBuilder } from './prompt.builder';

describe('PromptBuilder', () => {
  const builder = new PromptBuilder();

  it('embeds the text and difficulty verbatim in a single user message', () => {
    const text = '  Photosynthesis converts light to energy.\nChlorophyll is green.  ';
    const request = builder.build(text, 'Hard');

    expect(request.messages).toHaveLength(1);
    const [message] = request.messages;
    expect(message.role).toBe('user');
    expect(message.content).toContain(`Text: ${text}`);
    expect(message.content).toContain('Difficulty level: Hard');
    expect(message.content).toContain(
      '5. Maintain the specified difficulty level: Hard',
    );
  });

  it('states the output contract', () => {
    const { messages } = builder.build('Rivers flow to the sea.', 'easy');
    const content = messages[0].content;

    expect(content).toContain(
      'create a quiz with exactly 3 multiple choice questions',
    );
    expect(content).toContain('1. Generate exactly 3 questions');
    expect(content).toContain(
      '2. Each question must have exactly 4 options (a, b, c, d)',
    );
    expect(content).toContain('"mcqs": [');
    expect(content).toContain('"correct": "a"');
    expect(content).toContain(
      'Return ONLY the JSON object, no additional text or explanations.',
    );
  });

  it('uses the fixed sampling parameters', () => {
    const request = builder.build('Rivers flow to the sea.', 'medium');

    expect(request.temperature).toBe(0.7);
    expect(request.top_p).toBe(1);
    expect(request.max_tokens).toBe(2000);
  });

  it.each(['', '   ', '\n\t  \n'])(
    'rejects blank text %j',
    (text) => {
      expect(() => builder.build(text, 'easy')).toThrow(
        EmptyInputRejectedError,
      );
    },
  );

  it('does not modify its input', () => {
    const text = 'Mitochondria are the powerhouse of the cell.';
    const copy = `${text}`;
    builder.build(text, 'easy');
    expect(text).toBe(copy);
  });
});
