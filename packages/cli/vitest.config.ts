import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // git を起動するテストがあるため長めに取る
    testTimeout: 30000,
    hookTimeout: 30000,

    // console を差し替えるテストがあるため1つずつ実行
    pool: 'forks',
    poolOptions: {
      forks: {
        singleFork: true,
      },
    },

    reporters: ['default'],
    environment: 'node',
  },
});
