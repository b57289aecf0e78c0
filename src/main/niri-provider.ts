import type { FollowEvent, MoveCommand, WindowDescriptor } from "../types/windowFollow.js"
import { decodeEvent } from "./niri-codec.js"
import { NiriProtocolError, NiriReplyError, NiriSocket } from "./niri-socket.js"

export class NiriProvider {
  private events: NiriSocket
  private requests: NiriSocket

  constructor(events: NiriSocket, requests: NiriSocket) {
    this.events = events
    this.requests = requests
  }

  static async connect(path: string): Promise<NiriProvider> {
    const events = await NiriSocket.connect(path)
    try {
      const requests = await NiriSocket.connect(path)
      return new NiriProvider(events, requests)
    } catch (err) {
      events.close()
      throw err
    }
  }

  async subscribeEvents(): Promise<boolean> {
    const reply = await this.events.send({ type: "event-stream" })
    return reply.ok && reply.response.type === "handled"
  }

  async listWindows(): Promise<WindowDescriptor[]> {
    const reply = await this.requests.send({ type: "windows" })
    if (!reply.ok) throw new NiriReplyError(reply.message)
    if (reply.response.type !== "windows") {
      throw new NiriProtocolError(`Expected a window list, got ${reply.response.type}`)
    }
    return reply.response.windows
  }

  async moveWindow(command: MoveCommand): Promise<void> {
    const reply = await this.requests.send({ type: "move-window", command })
    if (!reply.ok) throw new NiriReplyError(reply.message)
  }

  async nextEvent(): Promise<FollowEvent | null> {
    const line = await this.events.nextLine()
    return line == null ? null : decodeEvent(line)
  }

  close(): void {
    this.events.close()
    this.requests.close()
  }
}

export function resolveSocketPath(explicit: string | null, env: NodeJS.ProcessEnv = process.env): string | null {
  if (explicit) return explicit
  const fromEnv = env["NIRI_SOCKET"] ?? ""
  return fromEnv.trim() ? fromEnv : null
}
