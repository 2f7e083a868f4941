import { describe, expect, it } from "vitest";
import {
  DependencyError,
  DependencyResolutionError,
  DocweaveError,
  FormatDetectionError,
  TransformError,
} from "../errors";

describe("error taxonomy", () => {
  it("keeps every error under the common base", () => {
    const error = new FormatDetectionError("report.bin");
    expect(error).toBeInstanceOf(DocweaveError);
    expect(error.name).toBe("FormatDetectionError");
    expect(error.message).toBe("Unable to detect format of report.bin");
  });

  it("lists missing packages with the remediation hint", () => {
    const error = new DependencyError(
      "docx",
      [
        { packageName: "mammoth", moduleName: "mammoth", versionRange: "", reason: "not-installed" },
        {
          packageName: "jszip",
          moduleName: "jszip",
          versionRange: ">=3.0.0",
          reason: "version-mismatch",
          installedVersion: "2.6.1",
        },
      ],
      'Install with: npm install mammoth jszip@">=3.0.0"'
    );

    expect(error.message).toBe(
      "Format 'docx' is missing dependencies: mammoth, jszip (installed 2.6.1, requires >=3.0.0). " +
        'Install with: npm install mammoth jszip@">=3.0.0"'
    );
    expect(error.format).toBe("docx");
  });

  it("records the cycle path on resolution errors", () => {
    const error = new DependencyResolutionError("a", "cycle", ["a", "b", "a"]);
    expect(error.cycle).toEqual(["a", "b", "a"]);
  });

  it("names the failing transform and keeps the cause", () => {
    const cause = new Error("bad pattern");
    const error = new TransformError("link-rewriter", { cause });
    expect(error.message).toBe("Transform 'link-rewriter' failed: bad pattern");
    expect(error.cause).toBe(cause);
  });
});
