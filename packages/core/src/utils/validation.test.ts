import { describe, test, expect } from "vitest";
import { DeployError, ExitCodes } from "./errors";
import {
  validatePort,
  validateRepoName,
  validateRequiredString,
  validateTag,
  validateUsername,
  validateVersion,
  validateImageName
} from "./validation";

describe("validateVersion", () => {
  test("accepts X.Y.Z", () => {
    expect(validateVersion(" 1.0.0 ")).toBe("1.0.0");
  });

  test.each(["1.0", "v1.0.0", "1.0.0-beta", "a.b.c"])("rejects %s", (value) => {
    expect(() => validateVersion(value)).toThrow("Version must be in format X.Y.Z (e.g., 1.0.0)");
  });

  test("requires a value", () => {
    expect(() => validateVersion("")).toThrow("Version is required");
  });

  test("uses the invalid argument exit code", () => {
    try {
      validateVersion("1.0");
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(DeployError);
      expect(err instanceof DeployError && err.exitCode).toBe(ExitCodes.INVALID_ARGUMENT);
    }
  });
});

describe("validateUsername", () => {
  test("accepts lowercase letters and digits", () => {
    expect(validateUsername("alice42")).toBe("alice42");
  });

  test("rejects names that are too short or contain other characters", () => {
    expect(() => validateUsername("abc")).toThrow("Invalid Docker Hub username: abc");
    expect(() => validateUsername("Alice")).toThrow("Invalid Docker Hub username: Alice");
  });
});

describe("validateImageName", () => {
  test("accepts separators between name components", () => {
    expect(validateImageName("chatterbox-whisper")).toBe("chatterbox-whisper");
    expect(validateImageName("speech.app_v2")).toBe("speech.app_v2");
  });

  test("rejects uppercase and leading separators", () => {
    expect(() => validateImageName("Speech")).toThrow("Invalid image name: Speech");
    expect(() => validateImageName("-speech")).toThrow("Invalid image name: -speech");
  });
});

describe("validateTag", () => {
  test("accepts common tags", () => {
    expect(validateTag("latest")).toBe("latest");
    expect(validateTag("1.0.0-gpu")).toBe("1.0.0-gpu");
  });

  test("rejects a leading dot", () => {
    expect(() => validateTag(".hidden")).toThrow("Invalid tag: .hidden");
  });
});

describe("validateRepoName", () => {
  test("rejects dot names", () => {
    expect(() => validateRepoName("..")).toThrow("Invalid repository name: ..");
  });

  test("accepts a plain name", () => {
    expect(validateRepoName("speech-app")).toBe("speech-app");
  });
});

describe("validatePort", () => {
  test("parses strings and numbers", () => {
    expect(validatePort("7860")).toBe(7860);
    expect(validatePort(7861)).toBe(7861);
  });

  test("rejects out of range values", () => {
    expect(() => validatePort("0")).toThrow("Invalid port: 0. Port must be a number between 1-65535");
    expect(() => validatePort("http")).toThrow("Invalid port: http");
  });
});

describe("validateRequiredString", () => {
  test("names the missing field", () => {
    expect(() => validateRequiredString("   ", "Commit message")).toThrow("Commit message is required");
  });
});
