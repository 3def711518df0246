/**
 * @license
 * Copyright 2025 Google LLC
 * SPDX-License-Identifier: Apache-2.0
 */

// Configuration
export * from './config/config.js';

// Buffer
export * from './buffer/lineStore.js';
export * from './buffer/range.js';
export * from './buffer/pattern.js';
export * from './buffer/cursorModel.js';

// Session
export * from './session/editorSession.js';

// Services
export * from './services/fileSystemService.js';

// Commands
export * from './commands/types.js';
export * from './commands/format.js';
export * from './commands/list.js';
export * from './commands/insert.js';
export * from './commands/delete.js';
export * from './commands/edit.js';
export * from './commands/replace.js';
export * from './commands/search.js';
export * from './commands/file.js';
export * from './commands/status.js';
export * from './commands/processor.js';

// Utilities
export * from './utils/errors.js';
export * from './utils/exitCodes.js';
export * from './utils/debugLogger.js';
export * from './utils/stdio.js';
