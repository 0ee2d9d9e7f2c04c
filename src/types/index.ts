export type UnsafeUrlHandler = (rejected: string) => void;

export interface SanitizeUrlOptions {
  /** Called with the original input whenever it is replaced by the placeholder. */
  onUnsafeUrl?: UnsafeUrlHandler;
}

export interface MarkdownRendererOptions {
  onUnsafeUrl?: UnsafeUrlHandler;
  /** Turn single newlines into `<br>`. Defaults to false. */
  breaks?: boolean;
}
