// packages/infra/src/logger-transports.ts
import * as fs from 'node:fs';
import * as path from 'node:path';
import { getLogDir } from './paths.js';

export interface FileTransportConfig {
  enabled: boolean;
  path?: string;
  fileName?: string; // 기본: cardlane.log
  maxSizeMb?: number; // 기본: 10
  maxFiles?: number; // 기본: 5
}

/**
 * tslog에 파일 트랜스포트 부착
 *
 * JSON 라인 형식으로 파일에 로그 기록.
 * 간단한 크기 기반 로테이션 (maxSizeMb 초과 시 새 파일).
 * 스트림 에러(디스크 부족, 권한) 시 stderr에 한 번 알리고 트랜스포트를 끈다.
 */
export function attachFileTransport(
  logger: { attachTransport: (fn: (logObj: unknown) => void) => void },
  config: FileTransportConfig,
): (() => Promise<void>) | undefined {
  if (!config.enabled) {
    return undefined;
  }

  const logDir = config.path ?? getLogDir();
  fs.mkdirSync(logDir, { recursive: true });

  const logFile = path.join(logDir, config.fileName ?? 'cardlane.log');
  let disabled = false;
  const openStream = (): fs.WriteStream =>
    createWriteStream(logFile).on('error', (error) => {
      if (!disabled) {
        disabled = true;
        process.stderr.write(`cardlane: log file transport disabled: ${error.message}\n`);
      }
    });

  let stream = openStream();
  let currentSize = getFileSize(logFile);
  const maxSize = (config.maxSizeMb ?? 10) * 1024 * 1024;
  const maxFiles = config.maxFiles ?? 5;

  logger.attachTransport((logObj: unknown) => {
    if (disabled) {
      return;
    }
    const line = JSON.stringify(logObj) + '\n';
    currentSize += Buffer.byteLength(line);

    if (currentSize > maxSize) {
      stream.end();
      rotateFiles(logFile, maxFiles);
      stream = openStream();
      currentSize = Buffer.byteLength(line);
    }

    stream.write(line);
  });

  // closure로 현재 활성 스트림을 추적
  return () =>
    new Promise<void>((resolve) => {
      if (disabled || stream.destroyed || stream.writableFinished) {
        resolve();
      } else {
        stream.end(resolve);
      }
    });
}

function createWriteStream(filePath: string): fs.WriteStream {
  return fs.createWriteStream(filePath, { flags: 'a', mode: 0o600 });
}

function getFileSize(filePath: string): number {
  return fs.existsSync(filePath) ? fs.statSync(filePath).size : 0;
}

/** 로그 파일 로테이션: cardlane.log → cardlane.log.1 → ... → cardlane.log.N */
function rotateFiles(basePath: string, maxFiles: number): void {
  for (let i = maxFiles - 1; i >= 1; i--) {
    const from = i === 1 ? basePath : `${basePath}.${i - 1}`;
    const to = `${basePath}.${i}`;
    if (fs.existsSync(from)) {
      fs.renameSync(from, to);
    }
  }
}
