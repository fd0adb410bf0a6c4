/**
 * Accumulator that folds ConverseStream frames into a Converse response.
 */

import type { ContentBlock, ConverseResponse, InvocationMetrics, TokenUsage } from '../types/converse.js';
import type { StreamFrame } from '../types/stream.js';

interface BlockState {
  text: string;
  toolUse?: { toolUseId: string; name: string };
  toolInput: string[];
  reasoning?: { text: string; signature?: string; redactedContent?: string };
}

/**
 * Reported when a block's fragments cannot be turned into a content block.
 */
export type BlockProblem = (contentBlockIndex: number, reason: string) => void;

/**
 * Folds validated stream frames, in stream order, into the response a non-streaming
 * Converse call would have returned.
 *
 * - Text and reasoning deltas concatenate per content block index
 * - Tool-use input fragments concatenate per block and are parsed as JSON at the end
 * - The last messageStop and metadata frames win
 *
 * @example
 * ```typescript
 * const accumulator = new ConverseStreamAccumulator();
 * for (const frame of frames) {
 *   accumulator.add(frame);
 * }
 * const response = accumulator.build();
 * ```
 */
export class ConverseStreamAccumulator {
  private role = 'assistant';
  private readonly blocks = new Map<number, BlockState>();
  private stopReason?: string;
  private usage?: TokenUsage;
  private metrics?: InvocationMetrics;
  private additionalModelResponseFields?: Record<string, unknown>;

  /**
   * Add one frame.
   */
  add(frame: StreamFrame): void {
    if (frame.messageStart) {
      this.role = frame.messageStart.role;
    }

    if (frame.contentBlockStart) {
      const block = this.block(frame.contentBlockStart.contentBlockIndex);
      const toolUse = frame.contentBlockStart.start.toolUse;
      if (toolUse) {
        block.toolUse = { toolUseId: toolUse.toolUseId, name: toolUse.name };
      }
    }

    if (frame.contentBlockDelta) {
      const block = this.block(frame.contentBlockDelta.contentBlockIndex);
      const delta = frame.contentBlockDelta.delta;

      if (delta.text !== undefined) {
        block.text += delta.text;
      }
      if (delta.toolUse) {
        block.toolInput.push(delta.toolUse.input);
      }
      if (delta.reasoningContent) {
        const reasoning = (block.reasoning ??= { text: '' });
        reasoning.text += delta.reasoningContent.text ?? '';
        if (delta.reasoningContent.signature !== undefined) {
          reasoning.signature = (reasoning.signature ?? '') + delta.reasoningContent.signature;
        }
        if (delta.reasoningContent.redactedContent !== undefined) {
          reasoning.redactedContent = (reasoning.redactedContent ?? '') + delta.reasoningContent.redactedContent;
        }
      }
    }

    if (frame.contentBlockStop) {
      this.block(frame.contentBlockStop.contentBlockIndex);
    }

    if (frame.messageStop) {
      this.stopReason = frame.messageStop.stopReason;
      if (frame.messageStop.additionalModelResponseFields) {
        this.additionalModelResponseFields = frame.messageStop.additionalModelResponseFields;
      }
    }

    if (frame.metadata) {
      if (frame.metadata.usage) {
        this.usage = frame.metadata.usage;
      }
      if (frame.metadata.metrics) {
        this.metrics = frame.metadata.metrics;
      }
    }
  }

  /**
   * Build the response accumulated so far.
   *
   * @param onProblem - Told about tool-use blocks whose input is not valid JSON or
   *   that never received a start frame
   */
  build(onProblem?: BlockProblem): ConverseResponse {
    const content = [...this.blocks.entries()]
      .sort(([a], [b]) => a - b)
      .map(([index, block]) => toContentBlock(index, block, onProblem));

    const response: ConverseResponse = {
      output: {
        message: { role: this.role, content },
      },
    };

    if (this.stopReason !== undefined) {
      response.stopReason = this.stopReason;
    }
    if (this.usage) {
      response.usage = this.usage;
    }
    if (this.metrics) {
      response.metrics = this.metrics;
    }
    if (this.additionalModelResponseFields) {
      response.additionalModelResponseFields = this.additionalModelResponseFields;
    }

    return response;
  }

  private block(index: number | undefined): BlockState {
    const key = index ?? 0;
    let block = this.blocks.get(key);
    if (!block) {
      block = { text: '', toolInput: [] };
      this.blocks.set(key, block);
    }
    return block;
  }
}

function toContentBlock(index: number, block: BlockState, onProblem?: BlockProblem): ContentBlock {
  if (block.toolUse || block.toolInput.length > 0) {
    if (!block.toolUse) {
      onProblem?.(index, 'tool use input arrived without a contentBlockStart frame');
    }
    return {
      toolUse: {
        toolUseId: block.toolUse?.toolUseId ?? '',
        name: block.toolUse?.name ?? '',
        input: parseToolInput(index, block.toolInput.join(''), onProblem),
      },
    };
  }

  if (block.reasoning) {
    const { text, signature, redactedContent } = block.reasoning;
    const reasoningContent: NonNullable<ContentBlock['reasoningContent']> = {
      reasoningText: signature === undefined ? { text } : { text, signature },
    };
    if (redactedContent !== undefined) {
      reasoningContent.redactedContent = redactedContent;
    }
    return { reasoningContent };
  }

  return { text: block.text };
}

function parseToolInput(index: number, raw: string, onProblem?: BlockProblem): unknown {
  if (raw.trim() === '') {
    return {};
  }
  try {
    return JSON.parse(raw);
  } catch {
    onProblem?.(index, 'tool use input is not valid JSON; keeping the raw text');
    return raw;
  }
}
