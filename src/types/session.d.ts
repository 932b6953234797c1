// src/types/session.d.ts
import 'express-session';
import type { FlashMessage } from '../shared/models/dto';

declare module 'express-session' {
  interface SessionData {
    flash?: FlashMessage[];
  }
}
