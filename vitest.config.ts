import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['ts/__tests__/**/*.test.ts']
    }
});
