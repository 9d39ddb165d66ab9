export class FetchError extends Error {
  constructor(
    public readonly url: string,
    public readonly status: number
  ) {
    super(`Failed to download ${url}: HTTP ${status}`)
    this.name = 'FetchError'
  }
}

export class PushError extends Error {
  constructor(
    message: string,
    public readonly userId: string,
    public readonly status?: number,
    public readonly errcode?: string
  ) {
    super(message)
    this.name = 'PushError'
  }
}

export class DoublePuppetError extends Error {
  constructor(
    message: string,
    public readonly userId: string
  ) {
    super(message)
    this.name = 'DoublePuppetError'
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly option: string
  ) {
    super(message)
    this.name = 'ConfigError'
  }
}
