import { describe, it, expect } from "vitest";

import { inferContentType } from "../../services/upload/content.type.js";

describe("inferContentType", () => {
  it("maps known extensions case-insensitively", () => {
    expect(inferContentType("clip.MP4")).toBe("video/mp4");
    expect(inferContentType("scan.pdf")).toBe("application/pdf");
    expect(inferContentType("photo.jpeg")).toBe("image/jpeg");
  });

  it("falls back to a generic binary type", () => {
    expect(inferContentType("data.xyz")).toBe("application/octet-stream");
    expect(inferContentType("README")).toBe("application/octet-stream");
  });
});
