/**
 * Fetch URL Tool
 *
 * Plain HTTP GET returning the response body as text.
 */

import { z } from 'zod';
import type { NativeTool, NativeToolResult } from './types.js';
import { parseParams } from './params.js';
import { errorMessage } from '../../utils/errors.js';

const FetchUrlParams = z.object({
  url: z.string().url(),
});

export class FetchUrlTool implements NativeTool {
  readonly name = 'fetch_url';
  readonly description = 'Fetch content from a URL with an HTTP GET request and return the response body.';

  readonly inputSchema = {
    type: 'object',
    properties: {
      url: { type: 'string', description: 'The URL to fetch' },
    },
    required: ['url'],
  };

  async execute(params: Record<string, unknown>): Promise<NativeToolResult> {
    const parsed = parseParams(FetchUrlParams, params);
    if (!parsed.ok) {
      return { success: false, error: parsed.error };
    }

    try {
      const response = await fetch(parsed.value.url, {
        headers: { 'User-Agent': 'skein/0.1' },
        redirect: 'follow',
      });
      if (!response.ok) {
        return { success: false, error: `HTTP ${response.status} ${response.statusText}`.trim() };
      }
      return { success: true, output: await response.text() };
    } catch (error) {
      return { success: false, error: errorMessage(error) };
    }
  }
}
