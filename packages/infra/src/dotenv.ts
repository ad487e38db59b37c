// packages/infra/src/dotenv.ts

/**
 * .env 파일 로딩 -- process.loadEnvFile() (Node.js 20.12+) 사용
 * dotenv 패키지 불필요. 파일이 없으면 건너뛴다.
 */
export function loadDotenv(envPath?: string): void {
  try {
    process.loadEnvFile(envPath);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return;
    }
    throw err;
  }
}
