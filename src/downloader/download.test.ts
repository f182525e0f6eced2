import { describe, expect, it } from "vitest";
import { artist, simplifiedTrack, track } from "../testing/fixtures";
import { buildTrackFilename, sanitizeFilename } from "./download";

describe("sanitizeFilename", () => {
  it("removes characters file systems reject", () => {
    expect(sanitizeFilename("AC/DC: \"Back\" <In> Black?")).toBe("ACDC Back In Black");
  });

  it("keeps letters from any script", () => {
    expect(sanitizeFilename("Beyoncé - Ça plane pour moi")).toBe("Beyoncé - Ça plane pour moi");
    expect(sanitizeFilename("坂本龍一 - Merry Christmas")).toBe("坂本龍一 - Merry Christmas");
  });

  it("drops symbols and collapses whitespace", () => {
    expect(sanitizeFilename("  Song   #1 [Remix] ★  ")).toBe("Song 1 Remix");
  });

  it("strips leading and trailing dots", () => {
    expect(sanitizeFilename("...hidden.")).toBe("hidden");
  });
});

describe("buildTrackFilename", () => {
  it("uses artist and title by default", () => {
    const halo = simplifiedTrack("abc", { name: "Halo", artists: [artist("Beyoncé")] });

    expect(buildTrackFilename(halo, "mp3")).toBe("Beyoncé - Halo.mp3");
  });

  it("expands every placeholder", () => {
    const getLucky = track("2Foc5Q5nqNiosCNqttzHof", {
      name: "Get Lucky",
      artists: [artist("Daft Punk"), artist("Pharrell Williams")],
      track_number: 8,
      disc_number: 1,
    });
    getLucky.album.name = "Random Access Memories";

    expect(buildTrackFilename(getLucky, "ogg", "{disc}-{track} {artists} - {title} ({album}) {id}"))
      .toBe("1-08 Daft Punk, Pharrell Williams - Get Lucky (Random Access Memories) 2Foc5Q5nqNiosCNqttzHof.ogg");
  });

  it("falls back to the track id when nothing printable remains", () => {
    expect(buildTrackFilename(simplifiedTrack("t1", { name: "???" }), "mp3", "{title}")).toBe("t1.mp3");
    expect(buildTrackFilename(simplifiedTrack("t2"), "mp3", "{album}")).toBe("t2.mp3");
  });

  it("leaves placeholders named after object members as written", () => {
    const halo = simplifiedTrack("abc", { name: "Halo" });

    expect(buildTrackFilename(halo, "mp3", "{constructor} {toString} - {title}")).toBe("constructor toString - Halo.mp3");
  });

  it("handles local tracks without an id", () => {
    expect(buildTrackFilename(simplifiedTrack("x", { id: null, name: "Demo" }), "mp3", "{title} {id}")).toBe("Demo.mp3");
    expect(buildTrackFilename(simplifiedTrack("x", { id: null, name: "???" }), "ogg", "{title}")).toBe("track.ogg");
  });
});
