import * as path from 'node:path';
import { defineConfig } from 'vitest/config';

// 워크스페이스 패키지는 빌드 없이 TypeScript 소스로 직접 로드
const workspacePackage = (name: string) => path.resolve(__dirname, 'packages', name, 'src/index.ts');

export default defineConfig({
  resolve: {
    alias: {
      '@plugin-atlas/shared': workspacePackage('shared'),
      '@plugin-atlas/config': workspacePackage('config'),
      '@plugin-atlas/discovery': workspacePackage('discovery'),
    },
  },
  test: {
    include: ['packages/*/test/**/*.test.ts'],
    environment: 'node',
  },
});
