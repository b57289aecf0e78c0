import type { FollowEvent, MoveCommand, TrackerState, WindowDescriptor } from "../types/windowFollow.js"
import type { Logger } from "./log.js"
import type { Matcher } from "./matcher.js"

export class WindowTracker {
  private matcher: Matcher
  private log: Logger
  private state: TrackerState = { trackedId: null }

  constructor(matcher: Matcher, log: Logger) {
    this.matcher = matcher
    this.log = log
  }

  getState(): TrackerState {
    return { ...this.state }
  }

  // First match wins; the rest of the snapshot is not looked at.
  seed(windows: Iterable<WindowDescriptor>): void {
    for (const window of windows) {
      if (this.matcher.matches(window)) {
        this.log.info(`Found a matching window with id ${window.id}`)
        this.state = { trackedId: window.id }
        return
      }
      this.log.debug(`Ignoring window "${window.title ?? String(window.id)}"`)
    }
  }

  handle(event: FollowEvent): MoveCommand | null {
    switch (event.type) {
      case "workspace-activated": {
        const trackedId = this.state.trackedId
        if (event.focused && trackedId != null) {
          this.log.info(`Workspace ${event.workspaceId} focused. Moving window ${trackedId}`)
          return { windowId: trackedId, workspaceId: event.workspaceId, focus: false }
        }
        this.log.debug(`Workspace ${event.workspaceId} focused but no window was detected`)
        return null
      }
      case "window-opened-or-changed": {
        // A window that stops matching stays tracked until it closes.
        const { window } = event
        if (this.matcher.matches(window) && this.state.trackedId !== window.id) {
          this.log.info(`Window ${window.id} matched patterns`)
          this.state = { trackedId: window.id }
        }
        return null
      }
      case "window-closed":
        if (this.state.trackedId === event.id) {
          this.log.info(`Window ${event.id} got closed`)
          this.state = { trackedId: null }
        }
        return null
      case "other":
        this.log.trace(`Ignoring ${event.name} event`)
        return null
    }
  }
}
