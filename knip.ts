import type { KnipConfig } from 'knip';

const config: KnipConfig = {
  entry: ['src/index.ts!', 'src/bin/argtree-demo.ts!'],
  project: ['src/**/*.ts!'],
};

export default config;
