export * from './fixtures.js';
export * from './jellyfinEmbyParserTests.js';
