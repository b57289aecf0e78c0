import type { FollowEvent, MoveCommand, TrackerState, WindowDescriptor } from "../types/windowFollow.js"
import type { Logger } from "./log.js"
import { NiriReplyError } from "./niri-socket.js"
import { WindowTracker } from "./tracker.js"
import type { Matcher } from "./matcher.js"

export type Provider = {
  subscribeEvents(): Promise<boolean>
  listWindows(): Promise<WindowDescriptor[]>
  moveWindow(command: MoveCommand): Promise<void>
  nextEvent(): Promise<FollowEvent | null>
}

function reason(err: unknown): string {
  return err instanceof Error ? err.message : String(err)
}

/**
 * Feeds the compositor's event stream into a {@link WindowTracker} and
 * delivers the moves it asks for. Returns when the stream ends.
 */
export class WindowFollowService {
  private provider: Provider
  private tracker: WindowTracker
  private log: Logger

  constructor(provider: Provider, matcher: Matcher, log: Logger) {
    this.provider = provider
    this.tracker = new WindowTracker(matcher, log)
    this.log = log
  }

  getState(): TrackerState {
    return this.tracker.getState()
  }

  async run(): Promise<void> {
    if (!(await this.subscribe())) {
      this.log.info("Event stream is not available; not tracking any window")
      return
    }

    this.log.info("Trying to fetch existing windows...")
    this.tracker.seed(await this.snapshot())

    this.log.info("Starting read of events")
    for (;;) {
      const event = await this.provider.nextEvent()
      if (!event) break
      const command = this.tracker.handle(event)
      if (command) await this.deliver(command)
    }
    this.log.info("Event stream ended")
  }

  private async subscribe(): Promise<boolean> {
    try {
      return await this.provider.subscribeEvents()
    } catch (err) {
      this.log.debug(`Event stream request failed: ${reason(err)}`)
      return false
    }
  }

  private async snapshot(): Promise<WindowDescriptor[]> {
    try {
      return await this.provider.listWindows()
    } catch (err) {
      if (!(err instanceof NiriReplyError)) throw err
      this.log.warn(`Could not fetch existing windows: ${err.message}`)
      return []
    }
  }

  // Best effort: the next focused workspace tries again.
  private async deliver(command: MoveCommand): Promise<void> {
    try {
      await this.provider.moveWindow(command)
    } catch (err) {
      this.log.error(`Failed to move window ${command.windowId} to workspace ${command.workspaceId}: ${reason(err)}`)
    }
  }
}
