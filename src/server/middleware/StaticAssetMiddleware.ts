// src/server/middleware/StaticAssetMiddleware.ts
import express from 'express';
import { repoPath } from '../utils/repoPath';

export const StaticAssetMiddleware = express.static(
  // maps request "/static/..." → disk "<repo>/public/static/..."
  repoPath('public', 'static'),
  {
    index: false,
    maxAge: process.env.NODE_ENV === 'production' ? '1d' : 0,
    fallthrough: true, // missing assets fall through to the not-found redirect
    setHeaders(res) {
      res.setHeader('X-Content-Type-Options', 'nosniff');
    },
  }
);
