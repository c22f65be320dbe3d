export class TargetNotFoundError extends Error {
  readonly target: string;
  readonly options: string[];

  constructor(target: string, filelistPath: string, options: string[]) {
    super(`Target '${target}' not in ${filelistPath}. Options: ${JSON.stringify(options)}`);
    this.name = "TargetNotFoundError";
    this.target = target;
    this.options = options;
  }
}

export class SubjectValidationError extends Error {
  readonly input: string;

  constructor(input: string) {
    super(`Unrecognized subject: ${input}`);
    this.name = "SubjectValidationError";
    this.input = input;
  }
}

export class CatalogFetchError extends Error {
  readonly statusCode?: number;

  constructor(message: string, statusCode?: number) {
    super(message);
    this.name = "CatalogFetchError";
    this.statusCode = statusCode;
  }
}

export class DownloadError extends Error {
  readonly url: string;
  readonly statusCode?: number;

  constructor(url: string, message: string, statusCode?: number) {
    super(`${message} (${url})`);
    this.name = "DownloadError";
    this.url = url;
    this.statusCode = statusCode;
  }
}
