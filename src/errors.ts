export class LookupError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class MessageNotFoundError extends LookupError {
  constructor(readonly key: number) {
    super(`No message with key ${key}`);
  }
}

export class PositionOutOfRangeError extends LookupError {
  constructor(
    readonly position: number,
    readonly length: number
  ) {
    super(`Index out of range: ${position} (have ${length} rows)`);
  }
}

export class MailboxLockedError extends Error {
  constructor(readonly lockPath: string) {
    super(`Mailbox is locked: ${lockPath} already exists`);
    this.name = "MailboxLockedError";
  }
}
