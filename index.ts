import { run } from './src/azure';

async function main() {
  return run();
}

export = main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
  throw err;
});
