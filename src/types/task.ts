/**
 * Request task and multipart form part unions.
 */

/**
 * A single multipart form entry.
 */
export type FormPart =
  | {
      readonly type: 'binary';
      readonly data: Uint8Array;
      readonly fileName: string;
      readonly mimeType: string;
    }
  | {
      readonly type: 'text';
      readonly value: unknown;
    };

export const FormPart = {
  /** File part attached with a filename and content type. */
  binary(data: Uint8Array, fileName: string, mimeType: string): FormPart {
    return { type: 'binary', data, fileName, mimeType };
  },

  /** Plain form field; the value is sent as its string representation. */
  text(value: unknown): FormPart {
    return { type: 'text', value };
  },
};

/**
 * Payload shape of a request.
 */
export type RequestTask =
  | { readonly type: 'plain' }
  | { readonly type: 'parameters'; readonly parameters: Readonly<Record<string, unknown>> }
  | { readonly type: 'encodedBody'; readonly body: unknown }
  | { readonly type: 'uploadFile'; readonly filePath: string }
  | { readonly type: 'uploadMultipart'; readonly fields: Readonly<Record<string, FormPart>> }
  | { readonly type: 'download'; readonly url: string }
  | { readonly type: 'downloadResumable'; readonly offset?: number };

export type RequestTaskType = RequestTask['type'];

export const RequestTask = {
  plain(): RequestTask {
    return { type: 'plain' };
  },

  parameters(parameters: Record<string, unknown>): RequestTask {
    return { type: 'parameters', parameters };
  },

  encodedBody(body: unknown): RequestTask {
    return { type: 'encodedBody', body };
  },

  uploadFile(filePath: string): RequestTask {
    return { type: 'uploadFile', filePath };
  },

  uploadMultipart(fields: Record<string, FormPart>): RequestTask {
    return { type: 'uploadMultipart', fields };
  },

  download(url: string): RequestTask {
    return { type: 'download', url };
  },

  downloadResumable(offset?: number): RequestTask {
    return { type: 'downloadResumable', offset };
  },
};

/**
 * One-line description of a task for log output.
 */
export function describeTask(task: RequestTask): string {
  switch (task.type) {
    case 'plain':
      return 'Plain request';
    case 'parameters':
      return `Parameters: ${JSON.stringify(task.parameters)}`;
    case 'encodedBody':
      return `Body: ${safeStringify(task.body)}`;
    case 'uploadFile':
      return `Upload file: ${task.filePath}`;
    case 'uploadMultipart':
      return `Multipart fields: [${Object.keys(task.fields).join(', ')}]`;
    case 'download':
      return `Download from: ${task.url}`;
    case 'downloadResumable':
      return `Resumable download with offset: ${task.offset ?? 'none'}`;
  }
}

function safeStringify(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}
