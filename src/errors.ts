/**
 * ドメインエラーの基底クラス
 *
 * `code` は HTTP ステータスへの変換やログの集計に使う安定した識別子。
 */
export abstract class RecorderError extends Error {
  constructor(
    message: string,
    public readonly code: string,
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** ストリームへの接続失敗 / icy-metaint のネゴシエーション失敗 */
export class ConnectionError extends RecorderError {
  constructor(message: string) {
    super(message, 'CONNECTION_ERROR');
  }
}

/** 録音ファイルを作成できない */
export class OutputError extends RecorderError {
  constructor(message: string) {
    super(message, 'OUTPUT_ERROR');
  }
}

export class ConfigError extends RecorderError {
  constructor(message: string) {
    super(message, 'INVALID_CONFIG');
  }
}

export class InvalidArgumentError extends RecorderError {
  constructor(message: string) {
    super(message, 'INVALID_ARGUMENT');
  }
}

export class InvalidOperationError extends RecorderError {
  constructor(message: string) {
    super(message, 'INVALID_OPERATION');
  }
}

export class StreamNotFoundError extends RecorderError {
  constructor(streamId: string) {
    super(`Stream not found: ${streamId}`, 'STREAM_NOT_FOUND');
  }
}

export class SessionNotFoundError extends RecorderError {
  constructor(sessionId: string) {
    super(`Recording session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
  }
}

export class ProgramNotFoundError extends RecorderError {
  constructor(programId: string) {
    super(`Program not found: ${programId}`, 'PROGRAM_NOT_FOUND');
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
