/**
 * Free-text expense parsing using the OpenAI chat completions API
 */

import { ExpenseParseError } from './errors.js';

import type { KnownUser } from '../types.js';
import type OpenAI from 'openai';

export interface ParseContext {
  requester: KnownUser;
  friends: KnownUser[];
}

/**
 * Language-model side of the expense pipeline. The parse result is left
 * untyped on purpose: it is validated by the normalizer.
 */
export interface ExpenseParser {
  parse(text: string, context: ParseContext): Promise<unknown>;
  /** Returns a clarification question, or null when the message is clear */
  checkClarity(text: string, parsed: unknown): Promise<string | null>;
}

const SELF_REFERENCES = ['me', 'mine', 'self'];

function fullName(user: KnownUser): string {
  return user.lastName === null || user.lastName === '' ? user.firstName : `${user.firstName} ${user.lastName}`;
}

/**
 * Builds the system and user prompts for expense extraction
 */
export function buildParsePrompt(text: string, context: ParseContext): { system: string; user: string } {
  const friendList = context.friends.map((friend) => `${fullName(friend)} (id: ${friend.id})`).join(', ');
  const selfRefs = [context.requester.firstName, ...SELF_REFERENCES].join(', ');

  const system =
    'You are a financial assistant that extracts structured JSON from natural-language expense messages. ' +
    'Return ONLY a raw JSON object without markdown formatting or commentary. ' +
    'Ensure all amounts are numbers, not strings.';

  const user = `You are the user: ${context.requester.firstName} (id: ${context.requester.id}).
You may refer to yourself as: ${selfRefs}.
Your friends are: ${friendList === '' ? 'none' : friendList}.
The user sent this message: "${text}".
Convert it into a JSON object with:
- amount: total expense amount (number)
- currency: ISO currency code, or null if not mentioned
- payer: who paid (name or "me")
- participants: list of objects with
    - name: participant name ("me" for the user)
    - share: amount they owe (number, or null if unspecified)
- description: a concise, natural-sounding summary (max 4 words, no generic phrases like "expense for")

Output ONLY a valid JSON object.`;

  return { system, user };
}

/**
 * Extracts the JSON object from a model reply, tolerating markdown fences
 */
export function extractJson(content: string): unknown {
  const stripped = content
    .trim()
    .replace(/^```(?:json)?\s*/i, '')
    .replace(/\s*```$/, '')
    .trim();

  try {
    return JSON.parse(stripped);
  } catch {
    throw new ExpenseParseError(`Model returned invalid JSON: ${stripped.slice(0, 200)}`);
  }
}

export interface OpenAIParserOptions {
  model?: string;
}

export class OpenAIExpenseParser implements ExpenseParser {
  private readonly model: string;

  constructor(
    private readonly openai: OpenAI,
    options: OpenAIParserOptions = {},
  ) {
    this.model = options.model ?? 'gpt-4o-mini';
  }

  async parse(text: string, context: ParseContext): Promise<unknown> {
    const prompt = buildParsePrompt(text, context);

    let content: string | null | undefined;
    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [
          { role: 'system', content: prompt.system },
          { role: 'user', content: prompt.user },
        ],
        response_format: { type: 'json_object' },
        max_tokens: 500,
        temperature: 0.1,
      });
      content = response.choices[0]?.message.content;
    } catch (error) {
      throw new ExpenseParseError(
        `Parsing failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }

    if (content === null || content === undefined || content === '') {
      throw new ExpenseParseError('No response from the language model');
    }

    console.log(`🧠 Model parse: ${content}`);
    return extractJson(content);
  }

  async checkClarity(text: string, parsed: unknown): Promise<string | null> {
    const prompt =
      `The user sent this message: '${text}'.\n` +
      `You parsed it as: ${JSON.stringify(parsed)}\n` +
      'Does this message clearly specify who paid and who owes what? ' +
      "If yes, reply ONLY with 'OK'. If not, reply with a clarification question to ask the user.";

    try {
      const response = await this.openai.chat.completions.create({
        model: this.model,
        messages: [{ role: 'user', content: prompt }],
        max_tokens: 200,
        temperature: 0.1,
      });
      const content = response.choices[0]?.message.content?.trim() ?? '';
      const verdict = content.replace(/[.!\s]+$/, '').toUpperCase();
      return verdict === '' || verdict === 'OK' ? null : content;
    } catch (error) {
      throw new ExpenseParseError(
        `Clarity check failed: ${error instanceof Error ? error.message : String(error)}`,
      );
    }
  }
}
