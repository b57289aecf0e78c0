import type { FollowEvent, MoveCommand, WindowDescriptor } from "../types/windowFollow.js"

// niri speaks newline-delimited JSON with serde's externally tagged enums.

export type NiriRequest =
  | { type: "event-stream" }
  | { type: "windows" }
  | { type: "move-window"; command: MoveCommand }

export type NiriResponse =
  | { type: "handled" }
  | { type: "windows"; windows: WindowDescriptor[] }
  | { type: "other"; name: string }

export type NiriReply = { ok: true; response: NiriResponse } | { ok: false; message: string }

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value)
}

function optionalString(value: unknown): string | null {
  return typeof value === "string" ? value : null
}

function parseLine(line: string): unknown {
  try {
    return JSON.parse(line)
  } catch {
    return undefined
  }
}

// Returns the single tag of `{"Tag": payload}`, or the bare string of a unit variant.
function untag(value: unknown): { tag: string; payload: unknown } | null {
  if (typeof value === "string") return { tag: value, payload: null }
  if (!isRecord(value)) return null
  const keys = Object.keys(value)
  if (keys.length !== 1) return null
  return { tag: keys[0], payload: value[keys[0]] }
}

export function encodeRequest(request: NiriRequest): string {
  switch (request.type) {
    case "event-stream":
      return JSON.stringify("EventStream")
    case "windows":
      return JSON.stringify("Windows")
    case "move-window": {
      const { windowId, workspaceId, focus } = request.command
      return JSON.stringify({
        Action: {
          MoveWindowToWorkspace: { window_id: windowId, reference: { Id: workspaceId }, focus }
        }
      })
    }
  }
}

export function decodeWindow(value: unknown): WindowDescriptor | null {
  if (!isRecord(value) || typeof value.id !== "number") return null
  return { id: value.id, title: optionalString(value.title), appId: optionalString(value.app_id) }
}

export function decodeReply(line: string): NiriReply | null {
  const reply = untag(parseLine(line))
  if (!reply) return null
  if (reply.tag === "Err") {
    return { ok: false, message: typeof reply.payload === "string" ? reply.payload : JSON.stringify(reply.payload) }
  }
  if (reply.tag !== "Ok") return null

  const response = untag(reply.payload)
  if (!response) return null
  if (response.tag === "Handled") return { ok: true, response: { type: "handled" } }
  if (response.tag === "Windows" && Array.isArray(response.payload)) {
    const windows: WindowDescriptor[] = []
    for (const item of response.payload) {
      const window = decodeWindow(item)
      if (window) windows.push(window)
    }
    return { ok: true, response: { type: "windows", windows } }
  }
  return { ok: true, response: { type: "other", name: response.tag } }
}

export function decodeEvent(line: string): FollowEvent {
  const event = untag(parseLine(line))
  if (!event) return { type: "other", name: "unknown" }
  const payload = isRecord(event.payload) ? event.payload : {}

  switch (event.tag) {
    case "WorkspaceActivated":
      if (typeof payload.id === "number" && typeof payload.focused === "boolean") {
        return { type: "workspace-activated", workspaceId: payload.id, focused: payload.focused }
      }
      break
    case "WindowOpenedOrChanged": {
      const window = decodeWindow(payload.window)
      if (window) return { type: "window-opened-or-changed", window }
      break
    }
    case "WindowClosed":
      if (typeof payload.id === "number") return { type: "window-closed", id: payload.id }
      break
    default:
      return { type: "other", name: event.tag }
  }
  return { type: "other", name: "unknown" }
}
