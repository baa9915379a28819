import eslint from '@eslint/js';
import tseslint from 'typescript-eslint';

export default tseslint.config(
  eslint.configs.recommended,
  ...tseslint.configs.recommended,
  {
    ignores: ['**/dist/**', '**/node_modules/**', '**/public/**', 'examples/**'],
  },
  {
    files: ['packages/core/src/**/*.ts'],
    rules: {
      'no-restricted-imports': ['error', {
        patterns: [
          { group: ['@marketsim/agent', '@marketsim/cli'], message: 'Core package cannot depend on the agent or cli packages' },
          { group: ['express', 'node:http', 'node:readline*'], message: 'Core package stays free of I/O surfaces: use @marketsim/cli' },
        ],
      }],
    },
  },
  {
    files: ['packages/agent/src/**/*.ts'],
    rules: {
      'no-restricted-imports': ['error', {
        patterns: [
          { group: ['@marketsim/cli'], message: 'Agent package cannot depend on the cli package' },
          { group: ['express', 'node:http', 'node:readline*'], message: 'Agent package reports through events: render and serve in @marketsim/cli' },
        ],
      }],
    },
  },
);
