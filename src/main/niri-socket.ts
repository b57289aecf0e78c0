import { once } from "node:events"
import { createConnection } from "node:net"
import { createInterface, type Interface } from "node:readline"
import type { Duplex } from "node:stream"
import { decodeReply, encodeRequest, type NiriReply, type NiriRequest } from "./niri-codec.js"

/** The compositor answered a request with an `Err` reply. */
export class NiriReplyError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "NiriReplyError"
  }
}

/** A reply could not be read or understood. */
export class NiriProtocolError extends Error {
  constructor(message: string) {
    super(message)
    this.name = "NiriProtocolError"
  }
}

export class NiriSocket {
  private stream: Duplex
  private reader: Interface
  private lines: AsyncIterator<string>
  private failure: Error | null = null

  constructor(stream: Duplex) {
    this.stream = stream
    this.reader = createInterface({ input: stream, crlfDelay: Infinity })
    this.lines = this.reader[Symbol.asyncIterator]()
    const fail = (err: Error) => {
      this.failure = err
      this.reader.close()
    }
    stream.on("error", fail)
    this.reader.on("error", fail)
  }

  static async connect(path: string): Promise<NiriSocket> {
    const socket = createConnection(path)
    await once(socket, "connect")
    return new NiriSocket(socket)
  }

  async send(request: NiriRequest): Promise<NiriReply> {
    const line = `${encodeRequest(request)}\n`
    await new Promise<void>((resolve, reject) => {
      this.stream.write(line, (err) => (err ? reject(err) : resolve()))
    })
    const answer = await this.nextLine()
    if (answer == null) {
      const reason = this.failure ? `: ${this.failure.message}` : ""
      throw new NiriProtocolError(`Connection closed before a reply arrived${reason}`)
    }
    const reply = decodeReply(answer)
    if (!reply) throw new NiriProtocolError(`Unexpected reply: ${answer}`)
    return reply
  }

  /** Next line from the compositor, or null once the stream has ended. */
  async nextLine(): Promise<string | null> {
    try {
      const next = await this.lines.next()
      return next.done ? null : next.value
    } catch (err) {
      // A broken connection ends the stream; send() reports the cause.
      this.failure = err instanceof Error ? err : new Error(String(err))
      return null
    }
  }

  close(): void {
    this.reader.close()
    this.stream.destroy()
  }
}
