import { Router } from 'express';
import { z } from 'zod';
import { sendSuccess, validateInput } from '@songharvest/platform-core';
import type { SongListParser } from '../../application/services/SongListParser';

const ParseRequestSchema = z.object({ text: z.string().min(1, 'text is required') });

export function createSongListRoutes(parser: SongListParser): Router {
  const router = Router();

  router.post('/song-lists/parse', (req, res) => {
    const { text } = validateInput(ParseRequestSchema, req.body);
    const songs = parser.parse(text);
    sendSuccess(res, { songs, count: songs.length });
  });

  return router;
}
