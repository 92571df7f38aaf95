import type { Loggable, LogMetadataRecord } from '@pathmatch/logger';

import type { InvalidPatternReason } from '../enums';

export class PathPatternError extends Error {
  constructor(message: string) {
    super(message);

    this.name = new.target.name;
  }
}

export class InvalidPatternError extends PathPatternError implements Loggable {
  readonly pattern: string;
  readonly reason: InvalidPatternReason;
  readonly position?: number;

  constructor(reason: InvalidPatternReason, message: string, pattern: string, position?: number) {
    super(position === undefined ? `${message} (pattern: '${pattern}')` : `${message} (pattern: '${pattern}', position: ${position})`);

    this.reason = reason;
    this.pattern = pattern;
    this.position = position;
  }

  toLog(): LogMetadataRecord {
    return { reason: this.reason, pattern: this.pattern, position: this.position };
  }
}
