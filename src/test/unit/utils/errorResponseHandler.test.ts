import { expect } from "chai";
import { describe, it } from "mocha";

import { OutputClosedError, ProfileError, QueueExhaustedError, StreamReadError } from "../../../engine/errors.js";
import {
  detectHTTPError,
  extractErrorMessage,
  handleStreamingError,
} from "../../../utils/http/errorResponseHandler.js";

import type { Response } from "express";

class MockResponse {
  public headersSent = false;
  public writableEnded = false;
  public destroyed = false;
  public destroyedWith: Error | undefined;
  public statusCode = 200;
  public body: unknown;

  status(code: number): this {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): this {
    this.body = body;
    this.headersSent = true;
    this.writableEnded = true;
    return this;
  }

  end(): void {
    this.writableEnded = true;
  }

  destroy(error?: Error): this {
    this.destroyed = true;
    this.destroyedWith = error;
    return this;
  }
}

describe("errorResponseHandler", () => {
  describe("extractErrorMessage", () => {
    it("handles every kind of thrown value", () => {
      expect(extractErrorMessage(new Error("boom"))).to.equal("boom");
      expect(extractErrorMessage("  ")).to.equal("Unknown error (empty string)");
      expect(extractErrorMessage({ code: 7 })).to.equal('Error details: {"code":7}');
      expect(extractErrorMessage(undefined)).to.equal("Unknown error");
    });
  });

  describe("detectHTTPError", () => {
    it("maps engine errors to status codes", () => {
      expect(detectHTTPError(new ProfileError("Unknown profile")).statusCode).to.equal(404);
      expect(detectHTTPError(new StreamReadError("XML read error")).statusCode).to.equal(400);
      expect(detectHTTPError(new QueueExhaustedError(32))).to.deep.equal({
        error: "Insufficient Storage",
        message: "Queue cannot grow to 32 slots",
        statusCode: 507,
      });
      expect(detectHTTPError(new OutputClosedError("Output closed after 3 lines")).statusCode).to.equal(499);
      expect(detectHTTPError(new TypeError("bug")).statusCode).to.equal(500);
    });
  });

  describe("handleStreamingError", () => {
    it("sends a JSON error before anything was written", () => {
      const res = new MockResponse();

      const status = handleStreamingError(res as unknown as Response, new StreamReadError("bad markup"), "TEST");

      expect(status).to.equal(400);
      expect(res.statusCode).to.equal(400);
      expect(res.body).to.deep.equal({ error: "Bad Request", message: "bad markup" });
    });

    it("aborts a stream that already has records instead of ending it", () => {
      const res = new MockResponse();
      res.headersSent = true;
      const error = new StreamReadError("bad markup");

      const status = handleStreamingError(res as unknown as Response, error, "TEST");

      expect(status).to.be.undefined;
      expect(res.destroyed).to.be.true;
      expect(res.destroyedWith).to.equal(error);
      expect(res.writableEnded).to.be.false;
      expect(res.body).to.be.undefined;
    });

    it("wraps a non-Error value when aborting", () => {
      const res = new MockResponse();
      res.headersSent = true;

      handleStreamingError(res as unknown as Response, "gone", "TEST");

      expect(res.destroyedWith?.message).to.equal("gone");
    });

    it("leaves a response that is already closed alone", () => {
      const res = new MockResponse();
      res.headersSent = true;
      res.writableEnded = true;

      expect(handleStreamingError(res as unknown as Response, new StreamReadError("bad markup"), "TEST")).to.be.undefined;
      expect(res.destroyed).to.be.false;
    });
  });
});
