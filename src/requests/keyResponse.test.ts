import { describe, it, expect } from "@jest/globals";
import { ProtocolError } from "../transport/errors.js";
import type { DecodedResponse } from "../transport/types.js";
import { KeyError, parseKeyResponse } from "./keyResponse.js";

function response(body: unknown, status = 200): DecodedResponse {
  const text = typeof body === "string" ? body : JSON.stringify(body);
  return { status, headers: {}, body: Buffer.from(text, "utf8") };
}

describe("parseKeyResponse", () => {
  it("should parse a key result with its previous node", () => {
    const result = parseKeyResponse(
      response({
        action: "set",
        node: { key: "/foo", value: "new", modifiedIndex: 9, createdIndex: 9, ttl: 60 },
        prevNode: { key: "/foo", value: "old", modifiedIndex: 8, createdIndex: 8 },
      })
    );

    expect(result.action).toBe("set");
    expect(result.node.value).toBe("new");
    expect(result.node.ttl).toBe(60);
    expect(result.prevNode?.value).toBe("old");
  });

  it("should parse nested directories", () => {
    const result = parseKeyResponse(
      response({
        action: "get",
        node: {
          dir: true,
          nodes: [
            { key: "/dir/a", value: "1" },
            { key: "/dir/sub", dir: true, nodes: [{ key: "/dir/sub/b", value: "2" }] },
          ],
        },
      })
    );

    expect(result.node.key).toBeUndefined();
    expect(result.node.nodes?.[1].nodes?.[0].value).toBe("2");
  });

  it("should throw KeyError for error bodies", () => {
    const call = () =>
      parseKeyResponse(
        response(
          { errorCode: 101, message: "Compare failed", cause: "[old != new]", index: 8 },
          412
        )
      );

    expect(call).toThrow(KeyError);
    expect(call).toThrow("Compare failed ([old != new])");
    try {
      call();
    } catch (error) {
      expect(error).toMatchObject({
        name: "KeyError",
        errorCode: 101,
        status: 412,
        index: 8,
        detail: "[old != new]",
      });
    }
  });

  it("should throw ProtocolError for bodies that are not JSON", () => {
    const call = () => parseKeyResponse(response("<html>bad gateway</html>", 502));

    expect(call).toThrow(ProtocolError);
    expect(call).toThrow("Response (HTTP 502) is not valid JSON.");
  });

  it("should throw ProtocolError for unexpected shapes", () => {
    expect(() => parseKeyResponse(response({ action: 1 }))).toThrow(
      /^Unexpected key response: action: /
    );
  });
});
