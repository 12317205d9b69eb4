import eslint from '@eslint/js';
import { defineConfig } from 'eslint/config';
import globals from 'globals';
import { plugin as tseslintPlugin, configs as tseslintConfigs } from 'typescript-eslint';

export default defineConfig([
  {
    ignores: ['node_modules', '**/node_modules/**', '**/*.js', '**/*.d.ts', 'dist', '**/dist/**'],
  },
  {
    files: ['**/*.ts'],
    languageOptions: {
      globals: {
        ...globals.node,
      },
      ecmaVersion: 'latest',
      sourceType: 'module',
      parserOptions: {
        projectService: true,
        tsconfigRootDir: import.meta.dirname,
      },
    },
    plugins: {
      '@typescript-eslint': tseslintPlugin,
    },
    extends: [
      eslint.configs.recommended,
      tseslintConfigs.recommended,
      tseslintConfigs.recommendedTypeChecked,
    ],
    rules: {
      'no-unused-vars': 'off',
      '@typescript-eslint/no-unused-vars': [
        'warn',
        {
          vars: 'all',
          varsIgnorePattern: '^_',
          args: 'after-used',
          argsIgnorePattern: '^_',
        },
      ],
      '@typescript-eslint/member-ordering': [
        'error',
        {
          default: [
            'signature',

            'public-static-field',
            'protected-static-field',
            'private-static-field',

            'public-abstract-field',
            'public-decorated-field',
            'public-instance-field',

            'protected-abstract-field',
            'protected-decorated-field',
            'protected-instance-field',

            'private-decorated-field',
            'private-instance-field',

            'public-constructor',
            'protected-constructor',
            'private-constructor',

            'public-static-method',
            'protected-static-method',
            'private-static-method',

            'public-abstract-method',
            'public-decorated-method',
            'public-instance-method',

            'protected-abstract-method',
            'protected-decorated-method',
            'protected-instance-method',

            'private-decorated-method',
            'private-instance-method',
          ],
        },
      ],
      curly: 'error',
      'block-spacing': 'error',
      'space-before-blocks': 'error',
      'brace-style': 'error',
      'no-else-return': 'error',
      'no-unneeded-ternary': 'error',
      'default-case': 'error',
      'default-case-last': 'error',
      'default-param-last': 'error',
      'no-self-compare': 'error',
      'no-unmodified-loop-condition': 'error',
      'no-loop-func': 'error',
      'for-direction': 'error',
      'keyword-spacing': ['error', { before: true, after: true }],
      'semi-spacing': ['error', { before: false, after: true }],
      'space-in-parens': ['error', 'never'],
      'object-curly-spacing': ['error', 'always'],
      'array-bracket-spacing': ['error', 'never'],
      'comma-spacing': ['error', { before: false, after: true }],
      quotes: ['error', 'single'],
      semi: ['error', 'always'],
      'comma-dangle': ['error', 'always-multiline'],
      '@typescript-eslint/no-empty-object-type': [
        'error',
        {
          allowInterfaces: 'always',
        },
      ],
      '@typescript-eslint/unbound-method': 'off',
    },
  },
]);
