/**
 * tests/unit/core/snowflake.test.ts: Snowflake facade and NodeIdResolver
 *
 * SF_*: facade wiring (node id, generator, codec, parser)
 * NID_*: node id resolution order and validation
 */

import { Snowflake } from "../../../src/core/Snowflake"
import { NodeIdResolver } from "../../../src/core/SnowflakeGenerator"
import { SNOWFLAKE_EPOCH, SnowflakeLayout } from "../../../src/core/SnowflakeLayout"
import { SnowflakeValue } from "../../../src/core/SnowflakeValue"

const T0 = SNOWFLAKE_EPOCH + 1000

afterEach(() => {
  jest.restoreAllMocks()
})

describe("Snowflake", () => {
  test("SF_01: generate() stamps the configured nodeId", () => {
    const snowflake = Snowflake.initialize({ nodeId: 42, clock: () => T0 })

    const id = snowflake.generate()
    expect(SnowflakeValue.isSnowflakeValue(id)).toBe(true)
    expect(SnowflakeLayout.decompose(id.toBigInt())).toEqual({ timestamp: 1000, nodeId: 42, sequence: 0 })
    expect(SnowflakeLayout.decompose(snowflake.generateId())).toEqual({ timestamp: 1000, nodeId: 42, sequence: 1 })
  })

  test("SF_02: string nodeIds are hashed to a stable value", () => {
    const snowflake = Snowflake.initialize({ nodeId: "pod-backend-1" })
    expect(snowflake.getNodeId()).toBe(NodeIdResolver.hashToNodeId("pod-backend-1"))
  })

  test("SF_03: the random fallback is logged once with console.warn", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined)

    const snowflake = Snowflake.initialize({ env: {} })

    expect(warn).toHaveBeenCalledTimes(1)
    expect(warn.mock.calls[0][0]).toContain(`nodeId randomly assigned (nodeId=${snowflake.getNodeId()})`)
  })

  test("SF_04: explicit configuration logs nothing", () => {
    const warn = jest.spyOn(console, "warn").mockImplementation(() => undefined)
    Snowflake.initialize({ nodeId: 1 })
    expect(warn).not.toHaveBeenCalled()
  })

  test("SF_05: invalid options throw at initialization", () => {
    expect(() => Snowflake.initialize({ nodeId: 1024 })).toThrow(RangeError)
    expect(() => Snowflake.initialize({ nodeId: "   " })).toThrow(TypeError)
    expect(() => Snowflake.initialize({ nodeId: 1, pollIntervalMs: -1 })).toThrow(RangeError)
  })

  test("SF_06: encode, decode, parse and generationTime round trip a generated id", () => {
    const snowflake = Snowflake.initialize({ nodeId: 5, clock: () => T0 })
    const id = snowflake.generate()

    const encoded = snowflake.encode(id)
    expect(encoded).toBe("yyyyyyd7yywyy")
    expect(snowflake.encode(id.toBigInt())).toBe(encoded)
    expect(snowflake.decode(encoded)).toEqual({ ok: true, id: 4194324480n })
    expect(snowflake.parse(encoded).nodeId).toBe(5)
    expect(snowflake.generationTime(id).getTime()).toBe(T0)
    expect(snowflake.generationTime(id.toBigInt()).getTime()).toBe(T0)
  })

  test("SF_07: decode failures are soft", () => {
    const snowflake = Snowflake.initialize({ nodeId: 0 })
    expect(snowflake.decode("not-an-id-at!")).toEqual({ ok: false, reason: "INVALID_SYMBOL" })
  })

  test("SF_08: separate instances on distinct nodes never collide", () => {
    const a = Snowflake.initialize({ nodeId: 1, clock: () => T0 })
    const b = Snowflake.initialize({ nodeId: 2, clock: () => T0 })

    const ids = new Set<bigint>()
    for (let i = 0; i < 100; i++) {
      ids.add(a.generateId())
      ids.add(b.generateId())
    }
    expect(ids.size).toBe(200)
  })
})

describe("NodeIdResolver", () => {
  test("NID_01: explicit number wins over the environment", () => {
    expect(NodeIdResolver.resolve(7, { SNOWFLAKE_NODE_ID: "9" })).toEqual({ nodeId: 7, source: "explicit_number" })
  })

  test("NID_02: explicit string is trimmed and hashed", () => {
    expect(NodeIdResolver.resolve("  worker-a ", {})).toEqual({
      nodeId: NodeIdResolver.hashToNodeId("worker-a"),
      source: "explicit_string",
    })
  })

  test("NID_03: SNOWFLAKE_NODE_ID comes before POD_IP and HOSTNAME", () => {
    const env = { SNOWFLAKE_NODE_ID: " 12 ", POD_IP: "10.0.0.1", HOSTNAME: "host-a" }
    expect(NodeIdResolver.resolve(undefined, env)).toEqual({ nodeId: 12, source: "env" })
  })

  test("NID_04: invalid SNOWFLAKE_NODE_ID throws", () => {
    expect(() => NodeIdResolver.resolve(undefined, { SNOWFLAKE_NODE_ID: "abc" })).toThrow(RangeError)
    expect(() => NodeIdResolver.resolve(undefined, { SNOWFLAKE_NODE_ID: "2000" })).toThrow(RangeError)
    expect(() => NodeIdResolver.resolve(undefined, { SNOWFLAKE_NODE_ID: "-1" })).toThrow(RangeError)
  })

  test("NID_05: POD_IP comes before HOSTNAME", () => {
    expect(NodeIdResolver.resolve(undefined, { POD_IP: "10.0.0.1", HOSTNAME: "host-a" })).toEqual({
      nodeId: NodeIdResolver.hashToNodeId("10.0.0.1"),
      source: "pod_ip",
    })
    expect(NodeIdResolver.resolve(undefined, { HOSTNAME: "host-a" })).toEqual({
      nodeId: NodeIdResolver.hashToNodeId("host-a"),
      source: "hostname",
    })
  })

  test("NID_06: random fallback stays in range and carries a warning", () => {
    const resolution = NodeIdResolver.resolve(undefined, {})
    expect(resolution.source).toBe("random")
    expect(SnowflakeLayout.isValidNodeId(resolution.nodeId)).toBe(true)
    expect(resolution.warning).toMatch(/^\[zflake\] WARNING/)
  })

  test("NID_07: hashToNodeId is deterministic and 10-bit", () => {
    for (const input of ["a", "pod-backend-7d9f", "10.1.2.3", "worker-us-east-1a"]) {
      const nodeId = NodeIdResolver.hashToNodeId(input)
      expect(nodeId).toBe(NodeIdResolver.hashToNodeId(input))
      expect(SnowflakeLayout.isValidNodeId(nodeId)).toBe(true)
    }
  })
})
