import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    environment: 'node',
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: [
        'src/checks/batch.ts',
        'src/checks/sink.ts',
        'src/monitor/collector.ts',
        'src/monitor/fan-out.ts',
        'src/monitor/probe.ts',
        'src/monitor/targets.ts',
      ],
      thresholds: {
        lines: 90,
        functions: 90,
        statements: 90,
        branches: 85,
      },
    },
  },
});
