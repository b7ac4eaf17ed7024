export { createTestRepo, type TestRepo } from './test-repo.js';
export { makeHook, CapturedStream } from './hook.js';
