import { describe, expect, it } from "vitest"
import { fakeCompositor } from "../test/fakeCompositor.js"
import { NiriProvider, resolveSocketPath } from "./niri-provider.js"
import { NiriProtocolError, NiriReplyError, NiriSocket } from "./niri-socket.js"

const handled = '{"Ok":"Handled"}'

function provider(events: string[], answer: (request: string) => string[]) {
  const eventSide = fakeCompositor(() => events)
  const requestSide = fakeCompositor(answer)
  return {
    provider: new NiriProvider(new NiriSocket(eventSide.stream), new NiriSocket(requestSide.stream)),
    eventSide,
    requestSide
  }
}

describe("NiriProvider", () => {
  it("subscribes to the event stream on the event connection", async () => {
    const { provider: niri, eventSide, requestSide } = provider([handled], () => [])
    await expect(niri.subscribeEvents()).resolves.toBe(true)
    expect(eventSide.received).toEqual(['"EventStream"'])
    expect(requestSide.received).toEqual([])
  })

  it("reports an unsupported event stream", async () => {
    const { provider: niri } = provider(['{"Err":"unknown request"}'], () => [])
    await expect(niri.subscribeEvents()).resolves.toBe(false)
  })

  it("lists windows on the request connection", async () => {
    const { provider: niri, requestSide } = provider([], () => [
      '{"Ok":{"Windows":[{"id":5,"title":"Picture-in-Picture","app_id":"firefox"}]}}'
    ])
    await expect(niri.listWindows()).resolves.toEqual([{ id: 5, title: "Picture-in-Picture", appId: "firefox" }])
    expect(requestSide.received).toEqual(['"Windows"'])
  })

  it("raises Err replies to a window listing", async () => {
    const { provider: niri } = provider([], () => ['{"Err":"busy"}'])
    await expect(niri.listWindows()).rejects.toThrow(new NiriReplyError("busy"))
  })

  it("raises a listing answered with the wrong response", async () => {
    const { provider: niri } = provider([], () => [handled])
    await expect(niri.listWindows()).rejects.toThrow(new NiriProtocolError("Expected a window list, got handled"))
  })

  it("sends moves without focus", async () => {
    const { provider: niri, requestSide } = provider([], () => [handled])
    await niri.moveWindow({ windowId: 5, workspaceId: 2, focus: false })
    expect(requestSide.received).toEqual([
      '{"Action":{"MoveWindowToWorkspace":{"window_id":5,"reference":{"Id":2},"focus":false}}}'
    ])
  })

  it("raises a refused move", async () => {
    const { provider: niri } = provider([], () => ['{"Err":"no such window"}'])
    await expect(niri.moveWindow({ windowId: 5, workspaceId: 2, focus: false })).rejects.toThrow("no such window")
  })

  it("decodes streamed events until the stream ends", async () => {
    const { provider: niri, eventSide } = provider([handled, '{"WorkspaceActivated":{"id":2,"focused":false}}'], () => [])
    await niri.subscribeEvents()
    await expect(niri.nextEvent()).resolves.toEqual({ type: "workspace-activated", workspaceId: 2, focused: false })
    eventSide.stream.push(null)
    await expect(niri.nextEvent()).resolves.toBeNull()
  })

  it("closes both connections", () => {
    const { provider: niri, eventSide, requestSide } = provider([], () => [])
    niri.close()
    expect(eventSide.stream.destroyed).toBe(true)
    expect(requestSide.stream.destroyed).toBe(true)
  })
})

describe("resolveSocketPath", () => {
  it("prefers an explicit path", () => {
    expect(resolveSocketPath("/tmp/explicit.sock", { NIRI_SOCKET: "/run/niri.sock" })).toBe("/tmp/explicit.sock")
  })

  it("falls back to NIRI_SOCKET", () => {
    expect(resolveSocketPath(null, { NIRI_SOCKET: "/run/niri.sock" })).toBe("/run/niri.sock")
  })

  it("returns null when nothing is configured", () => {
    expect(resolveSocketPath(null, {})).toBeNull()
    expect(resolveSocketPath(null, { NIRI_SOCKET: "  " })).toBeNull()
  })
})
