// Console filtering: keep test output quiet unless explicitly requested.
const originalLog = console.log;
const originalWarn = console.warn;
const originalError = console.error;

const ALLOW_ALL = process.env.JEST_ALLOW_ALL_LOGS === '1';

console.log = (...args: unknown[]) => {
  if (ALLOW_ALL) originalLog(...args);
};
console.warn = (...args: unknown[]) => {
  if (ALLOW_ALL) originalWarn(...args);
};
console.error = (...args: unknown[]) => {
  if (ALLOW_ALL) originalError(...args);
};

// Restore original console methods after each suite
afterAll(() => {
  console.log = originalLog;
  console.warn = originalWarn;
  console.error = originalError;
});
