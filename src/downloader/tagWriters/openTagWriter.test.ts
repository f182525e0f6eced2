import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { UnsupportedFormatError } from "../../errors";
import { mpegFrames, vorbisFile } from "../../testing/audio";
import { Id3TagWriter } from "./id3TagWriter";
import { OggTagWriter } from "./oggTagWriter";
import { formatFromPath, isSupportedFormat, openTagWriter } from "./openTagWriter";
import { TagField } from "./tagWriter";

describe("formatFromPath", () => {
  it.each([
    ["song.mp3", "mp3"],
    ["/music/Song.MP3", "mp3"],
    ["song.ogg", "ogg"],
    ["song.oga", "ogg"],
    ["song.flac", null],
    ["song", null],
  ])("maps %s to %s", (path, format) => {
    expect(formatFromPath(path)).toBe(format);
  });
});

describe("openTagWriter", () => {
  let directory: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "tagger-open-"));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("rejects unsupported formats before touching the file", async () => {
    const error = await openTagWriter(join(directory, "does-not-exist.flac"), "flac").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(UnsupportedFormatError);
    expect(error).toMatchObject({ format: "flac", message: "Unsupported audio format: 'flac'" });
  });

  it("opens mp3 files with the requested ID3 version and separator", async () => {
    const path = join(directory, "song.mp3");
    await writeFile(path, mpegFrames());

    const writer = await openTagWriter(path, "mp3", { id3Version: 4, separator: " + " });
    writer.setField(TagField.Artist, ["A", "B"]);

    expect(writer).toBeInstanceOf(Id3TagWriter);
    expect(writer.format).toBe("mp3");
    expect(writer.getRaw("TPE1")).toBe("A + B");
    if (writer instanceof Id3TagWriter) expect(writer.id3Version).toBe(4);
    await writer.discard();
  });

  it("opens ogg files with Vorbis comments", async () => {
    const path = join(directory, "song.oga");
    await writeFile(path, vorbisFile([]));

    const writer = await openTagWriter(path, "ogg", { separator: "/" });
    writer.setField(TagField.Genre, ["Dub", "Techno"]);

    expect(writer).toBeInstanceOf(OggTagWriter);
    expect(writer.getRaw("GENRE")).toBe("Dub/Techno");
    await writer.discard();
  });

  it("narrows format strings", () => {
    expect(isSupportedFormat("ogg")).toBe(true);
    expect(isSupportedFormat("m4a")).toBe(false);
  });
});
