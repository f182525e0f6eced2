import { mkdtemp, readdir, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { parseFile } from "music-metadata";
import type { ITag } from "music-metadata";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { TagEncodingError } from "../../errors";
import { vorbisFile } from "../../testing/audio";
import { OggTagWriter } from "./oggTagWriter";
import { TagField } from "./tagWriter";

async function readComments(path: string): Promise<ITag[]> {
  const { native } = await parseFile(path);
  return native.vorbis ?? [];
}

function commentValues(comments: ITag[], key: string): unknown[] {
  return comments.filter(comment => comment.id === key).map(comment => comment.value);
}

describe("OggTagWriter", () => {
  let directory: string;
  let path: string;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), "tagger-ogg-"));
    path = join(directory, "song.ogg");
    await writeFile(path, vorbisFile([["TITLE", "Old"], ["COMPOSER", "Someone"]]));
  });

  afterEach(async () => {
    await rm(directory, { recursive: true, force: true });
  });

  it("reads the existing comments", async () => {
    const writer = await OggTagWriter.open(path);

    expect(writer.vendor).toBe("test-vendor");
    expect(writer.getRaw("title")).toBe("Old");
    expect(writer.getValues("COMPOSER")).toEqual(["Someone"]);
    await writer.discard();
  });

  it("replaces a field and keeps the other comments", async () => {
    const writer = await OggTagWriter.open(path);
    writer.setSeparator("; ");
    writer.setField(TagField.Title, ["Foo", "Bar"]);
    await writer.save();

    const metadata = await parseFile(path);
    expect(commentValues(metadata.native.vorbis, "TITLE")).toEqual(["Foo; Bar"]);
    expect(commentValues(metadata.native.vorbis, "COMPOSER")).toEqual(["Someone"]);
    expect(metadata.common.title).toBe("Foo; Bar");
  });

  it("maps fields to Vorbis comment names", async () => {
    const writer = await OggTagWriter.open(path);
    writer.setField(TagField.AlbumArtist, ["Various"]);
    writer.setField(TagField.Label, ["Test Label"]);
    writer.setField(TagField.DiscNumber, ["1"]);
    writer.setReleaseDate("2013-05-17");
    writer.addUniqueFileIdentifier("2Foc5Q5nqNiosCNqttzHof");
    await writer.save();

    const comments = await readComments(path);
    expect(commentValues(comments, "ALBUMARTIST")).toEqual(["Various"]);
    expect(commentValues(comments, "LABEL")).toEqual(["Test Label"]);
    expect(commentValues(comments, "DISCNUMBER")).toEqual(["1"]);
    expect(commentValues(comments, "DATE")).toEqual(["2013-05-17"]);
    expect(commentValues(comments, "UFID")).toEqual(["spotify.com:2Foc5Q5nqNiosCNqttzHof"]);
    expect((await parseFile(path)).common.date).toBe("2013-05-17");
  });

  it("keeps identifiers stored under other owners", async () => {
    await writeFile(path, vorbisFile([["UFID", "musicbrainz.org:abc"], ["UFID", "spotify.com:old"]]));

    const writer = await OggTagWriter.open(path);
    writer.addUniqueFileIdentifier("new");
    expect(writer.getUniqueFileIdentifier()).toBe("new");
    expect(writer.getUniqueFileIdentifier("musicbrainz.org")).toBe("abc");
    await writer.save();

    expect(commentValues(await readComments(path), "UFID")).toEqual(["musicbrainz.org:abc", "spotify.com:new"]);
  });

  it("uppercases raw keys and rejects invalid ones", async () => {
    const writer = await OggTagWriter.open(path);
    writer.setRaw("composer", ["Someone Else"]);

    expect(writer.getValues("COMPOSER")).toEqual(["Someone Else"]);
    expect(() => writer.setRaw("BAD=KEY", ["x"])).toThrow("'BAD=KEY' is not a valid Vorbis comment name");
    expect(() => writer.setRaw("", ["x"])).toThrow(TagEncodingError);
    await writer.discard();
  });

  it("embeds a single front cover as METADATA_BLOCK_PICTURE", async () => {
    const cover = new Uint8Array(70000).fill(7);
    const writer = await OggTagWriter.open(path);
    writer.addCover("image/jpeg", new Uint8Array([1]));
    writer.addCover("image/png", cover);
    expect(writer.getCover()).toEqual({ mime: "image/png", data: cover });
    await writer.save();

    const pictures = commentValues(await readComments(path), "METADATA_BLOCK_PICTURE");
    expect(pictures).toHaveLength(1);
    expect(pictures[0]).toMatchObject({ format: "image/png", type: "Cover (front)" });
    expect(commentValues(await readComments(path), "TITLE")).toEqual(["Old"]);
  });

  it("leaves no working copy behind", async () => {
    const writer = await OggTagWriter.open(path);
    writer.setField(TagField.Genre, ["Ambient"]);
    await writer.save();

    expect(await readdir(directory)).toEqual(["song.ogg"]);
  });

  it("rejects files that are not Ogg and cleans up", async () => {
    await writeFile(path, Buffer.from("RIFF0000WAVEfmt "));

    await expect(OggTagWriter.open(path)).rejects.toBeInstanceOf(TagEncodingError);
    expect(await readdir(directory)).toEqual(["song.ogg"]);
  });
});
