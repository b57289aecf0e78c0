import { Duplex } from "node:stream"

export type FakeCompositor = {
  stream: Duplex
  received: string[]
}

/** In-process stand-in for a niri socket: answers each request line with the lines `answer` returns. */
export function fakeCompositor(answer: (request: string) => string[]): FakeCompositor {
  const received: string[] = []
  const stream = new Duplex({
    read() {},
    write(chunk, _encoding, callback) {
      for (const request of String(chunk).split("\n").filter(Boolean)) {
        received.push(request)
        for (const line of answer(request)) this.push(`${line}\n`)
      }
      callback()
    }
  })
  return { stream, received }
}
