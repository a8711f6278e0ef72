/** The oracle answered, but not with what was asked for. */
export class MalformedResponseError extends Error {
  /** Model text as received, before fence stripping. */
  readonly responseText: string;

  constructor(message: string, responseText: string) {
    super(message);
    this.name = "MalformedResponseError";
    this.responseText = responseText;
  }
}
