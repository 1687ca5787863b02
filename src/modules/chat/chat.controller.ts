/**
 * Chat Controller
 * Farm advisor chat backed by Gemini
 */

import { Request, Response } from 'express';
import { asyncHandler, ApiError } from '../../middleware/error-handler';
import { ITextGenerator } from '../../lib/gemini';
import { describeError } from '../../lib/upstream/upstream.errors';
import { buildChatPrompt } from './chat.prompts';
import { chatRequestSchema } from './chat.validation';

export class ChatController {
  private advisor: ITextGenerator;

  constructor(advisor: ITextGenerator) {
    this.advisor = advisor;
  }

  /**
   * GET /api/chat
   */
  getInfo = asyncHandler(async (_req: Request, res: Response) => {
    res.json({
      message: 'Chat endpoint active. Use POST /api/chat with a JSON body { "message": "..." } to talk to the farm advisor.',
    });
  });

  /**
   * POST /api/chat
   */
  sendMessage = asyncHandler(async (req: Request, res: Response) => {
    const { message } = chatRequestSchema.parse(req.body);

    let response: string;
    try {
      response = await this.advisor.generateText(buildChatPrompt(message));
    } catch (error: unknown) {
      console.error('❌ Gemini chat error:', describeError(error));
      throw new ApiError(502, 'AI response failed. Please try again later.');
    }

    res.json({ response });
  });
}
