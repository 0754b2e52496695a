import js from '@eslint/js';
import tseslint from 'typescript-eslint';
import prettier from 'eslint-config-prettier';

export default [
  js.configs.recommended,
  ...tseslint.configs.recommended,
  prettier,
  {
    rules: {
      '@typescript-eslint/no-explicit-any': 'error',
      '@typescript-eslint/no-unused-vars': [
        'error',
        {
          argsIgnorePattern: '^_',
          varsIgnorePattern: '^_',
        },
      ],
      'no-console': [
        'warn',
        {
          allow: ['warn', 'error'],
        },
      ],
    },
  },
  {
    ignores: ['dist', 'node_modules'],
  },
  // The matcher's read path runs per request: no logging there.
  {
    files: ['src/router/**/*.ts'],
    rules: {
      'no-console': 'error',
    },
  },
  {
    files: ['benches/**/*.ts', 'tests/**/*.ts', 'test-d/**/*.ts'],
    languageOptions: {
      parser: tseslint.parser,
      parserOptions: {},
    },
  },
];
