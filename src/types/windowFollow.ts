export type WindowId = number

export type WorkspaceId = number

export type WindowDescriptor = {
  id: WindowId
  title: string | null
  appId: string | null
}

export type FollowEvent =
  | { type: "workspace-activated"; workspaceId: WorkspaceId; focused: boolean }
  | { type: "window-opened-or-changed"; window: WindowDescriptor }
  | { type: "window-closed"; id: WindowId }
  | { type: "other"; name: string }

export type MoveCommand = {
  windowId: WindowId
  workspaceId: WorkspaceId
  focus: false
}

export type TrackerState = {
  trackedId: WindowId | null
}
