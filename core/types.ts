export type CliCommand = 'new' | 'view' | 'context' | 'version';

export type ContextAction = 'show' | 'set' | 'clear';

export type CliOptions = {
  command: CliCommand;
  message: string;
  contextAction: ContextAction;
  contextText: string;
  provider: string;
  queryCommand: string;
  model: string;
  heldOutLines: number;
  widthMargin: number;
  renderCommand: string;
  renderTimeoutMs: number;
  stylePath?: string;
  pagerCommand: string;
  dataDir: string;
  shareDir: string;
  debug: boolean;
  verbose: boolean;
};

export type StreamResult = {
  status: number | null;
  stdout: string;
  stderr: string;
};

export type Conversation = {
  id: string;
  timestamp: Date;
  message: string;
  response: string;
  filePath: string;
  context?: string;
};

export type NewConversation = {
  message: string;
  response: string;
  context?: string;
};

export type Tone = 'neutral' | 'info' | 'success' | 'warn' | 'error' | 'muted';
