/**
 * Centralized regex handling for user-provided patterns.
 *
 * All user patterns (from any dialect, after translation) go through
 * UserRegex, which runs on RE2 for linear-time matching.
 *
 * Usage:
 *   import { createUserRegex } from '../regex/index.js';
 *
 *   const regex = createUserRegex(userPattern, 'i');
 *   for (const { start, end } of regex.spans(line)) { ... }
 */

export {
  createUserRegex,
  escapeRegex,
  type RegexSpan,
  translatePattern,
  UserRegex,
  type UserRegexOptions,
} from "./user-regex.js";
