import { describe, it, expect } from "@jest/globals";
import { RetryOnce } from "../transport/retry.js";
import { createInOrderKey, deleteKey, getKey, keyPath, setKey } from "./keyRequests.js";
import { parseKeyResponse } from "./keyResponse.js";
import { versionRequest } from "./versionRequest.js";

describe("key requests", () => {
  describe("keyPath", () => {
    it("should place keys under the keys prefix", () => {
      expect(keyPath("foo")).toBe("/v2/keys/foo");
      expect(keyPath("/dir/foo")).toBe("/v2/keys/dir/foo");
    });

    it("should encode each segment", () => {
      expect(keyPath("dir/my key")).toBe("/v2/keys/dir/my%20key");
    });
  });

  describe("getKey", () => {
    it("should build a GET with only the options given", () => {
      const request = getKey("foo", { recursive: true, waitIndex: 12 });

      expect(request.kind).toBe("key");
      expect(request.method).toBe("GET");
      expect(request.path).toBe("/v2/keys/foo");
      expect(request.params).toEqual({ recursive: "true", waitIndex: "12" });
      expect(request.onResponse).toBe(parseKeyResponse);
    });

    it("should carry timeout and retry policy", () => {
      const retryPolicy = new RetryOnce(10);
      const request = getKey("foo", { wait: true, timeoutMs: 5_000, retryPolicy });

      expect(request.timeoutMs).toBe(5_000);
      expect(request.retryPolicy).toBe(retryPolicy);
      expect(request.future).toBeUndefined();
    });
  });

  describe("setKey", () => {
    it("should encode query values", () => {
      const request = setKey("greeting", "hello world&more", { ttl: 60, prevExist: false });

      expect(request.method).toBe("PUT");
      expect(request.params).toEqual({
        value: "hello%20world%26more",
        ttl: "60",
        prevExist: "false",
      });
    });
  });

  describe("createInOrderKey", () => {
    it("should POST raw values for the form body", () => {
      const request = createInOrderKey("queue", "job a");

      expect(request.method).toBe("POST");
      expect(request.path).toBe("/v2/keys/queue");
      expect(request.params).toEqual({ value: "job a" });
    });
  });

  describe("deleteKey", () => {
    it("should build a DELETE", () => {
      const request = deleteKey("/dir", { recursive: true, dir: true });

      expect(request.method).toBe("DELETE");
      expect(request.path).toBe("/v2/keys/dir");
      expect(request.params).toEqual({ recursive: "true", dir: "true" });
    });
  });
});

describe("versionRequest", () => {
  it("should GET the version path and keep the text as is", () => {
    const request = versionRequest({ timeoutMs: 250 });

    expect(request.kind).toBe("version");
    expect(request.method).toBe("GET");
    expect(request.path).toBe("/version");
    expect(request.params).toBeUndefined();
    expect(request.timeoutMs).toBe(250);
    expect(request.fromText("3.5.0")).toBe("3.5.0");
  });
});
