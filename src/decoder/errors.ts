// Raised when the caller hands the decoder something it cannot run on at all
export class DecoderConfigError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'DecoderConfigError'
  }
}

export class OpcodeTableError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'OpcodeTableError'
  }
}

// The two below never leave decodeOne: they turn into INVALID records.

export class NotEnoughBytesError extends Error {
  has: number
  need: number

  constructor(has: number, need: number) {
    super(`need ${need} byte(s), ${has} available`)
    this.name = 'NotEnoughBytesError'
    this.has = has
    this.need = need
  }
}

export class InvalidEncodingError extends Error {
  constructor(message: string) {
    super(message)
    this.name = 'InvalidEncodingError'
  }
}
