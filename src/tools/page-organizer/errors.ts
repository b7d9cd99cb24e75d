export type PageOrganizerErrorKind =
  | 'invalid-selection'
  | 'source-open'
  | 'render'
  | 'export'

export class PageOrganizerError extends Error {
  readonly kind: PageOrganizerErrorKind

  constructor(kind: PageOrganizerErrorKind, message: string, options?: ErrorOptions) {
    super(message, options)
    this.name = 'PageOrganizerError'
    this.kind = kind
  }
}

/** Delete asked for nothing, or for every remaining page */
export class InvalidSelectionError extends PageOrganizerError {
  constructor(message: string) {
    super('invalid-selection', message)
    this.name = 'InvalidSelectionError'
  }
}

export class SourceOpenError extends PageOrganizerError {
  readonly fileName: string

  constructor(fileName: string, cause: unknown) {
    super('source-open', `Failed to load ${fileName}: ${errorMessage(cause)}`, { cause })
    this.name = 'SourceOpenError'
    this.fileName = fileName
  }
}

export class RenderError extends PageOrganizerError {
  readonly pageId: string

  constructor(pageId: string, cause: unknown) {
    super('render', `Thumbnail render failed for page ${pageId}: ${errorMessage(cause)}`, { cause })
    this.name = 'RenderError'
    this.pageId = pageId
  }
}

export class ExportError extends PageOrganizerError {
  constructor(cause: unknown) {
    super('export', errorMessage(cause), { cause })
    this.name = 'ExportError'
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}
