// Vitest configuration

import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    globals: true,

    environment: 'node',

    // sandbox tests spin up worker threads
    testTimeout: 20000,

    include: [
      'backend/src/**/*.{test,spec}.ts',
      'shared-types/**/*.{test,spec}.ts'
    ],

    exclude: ['node_modules/', 'dist/']
  }
})
