export class PanelError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class UnknownPanelError extends PanelError {
  readonly panelId: string;

  constructor(panelId: number | string) {
    super(`unknown panel id: ${panelId}`);
    this.panelId = String(panelId);
  }
}

export class NoSuchPanelError extends PanelError {
  readonly panelName: string;

  constructor(panelName: string) {
    super(`no such panel: ${panelName}`);
    this.panelName = panelName;
  }
}

export class MalformedEventTokenError extends PanelError {
  readonly token: string;

  constructor(token: string) {
    super(`malformed event token: ${JSON.stringify(token)}`);
    this.token = token;
  }
}

export class HandlerNotFoundError extends PanelError {
  readonly panelType: string;
  readonly routine: string;

  constructor(panelType: string, routine: string) {
    super(`panel ${panelType} has no handler for routine ${JSON.stringify(routine)}`);
    this.panelType = panelType;
    this.routine = routine;
  }
}

export class MissingParentError extends PanelError {
  constructor(message = "panel is not attached to a tree") {
    super(message);
  }
}

export class StoreError extends PanelError {}

/** Thrown when a name would collide with one of the wire separators. */
export class InvalidNameError extends PanelError {
  readonly field: string;
  readonly value: string;

  constructor(field: string, value: string, reason: string) {
    super(`${field} ${JSON.stringify(value)} ${reason}`);
    this.field = field;
    this.value = value;
  }
}
