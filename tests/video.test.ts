import { afterEach, describe, expect, it, vi } from "vitest";
import { metadataFromHtml, type VideoMetadata, type VideoMetadataSource } from "../src/lib/video/metadata";
import { detectPlatform, isVideoUrl } from "../src/lib/video/platform";
import { selectBestThumbnail } from "../src/lib/video/thumbnails";
import { SerpApiTranscriptSource, type TranscriptSource } from "../src/lib/video/transcript";
import { INSTAGRAM_AUTH_MESSAGE, VideoExtractor } from "../src/lib/video/video-extractor";
import { getYouTubeVideoId } from "../src/lib/video/youtube";

function metadataSource(metadata: VideoMetadata): VideoMetadataSource {
  return { extract: vi.fn(async () => metadata) };
}

function transcriptSource(text: string | null): TranscriptSource {
  return { fetchTranscript: vi.fn(async () => text) };
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("getYouTubeVideoId", () => {
  const id = "dQw4w9WgXcQ";

  it.each([
    `https://www.youtube.com/watch?v=${id}`,
    `https://youtu.be/${id}`,
    `https://www.youtube.com/embed/${id}`,
    `https://www.youtube.com/v/${id}`,
    `https://www.youtube.com/shorts/${id}`,
    `https://m.youtube.com/watch?feature=share&v=${id}`,
  ])("reads the id from %s", (url) => {
    expect(getYouTubeVideoId(url)).toBe(id);
  });

  it("keeps hyphens and underscores", () => {
    expect(getYouTubeVideoId("https://youtu.be/a-b_c1O0lI5?t=10")).toBe("a-b_c1O0lI5");
  });

  it("returns null for other hosts", () => {
    expect(getYouTubeVideoId("https://vimeo.com/12345")).toBeNull();
  });
});

describe("platform detection", () => {
  it("maps hosts to platforms", () => {
    expect(detectPlatform("https://youtu.be/abc")).toBe("youtube");
    expect(detectPlatform("https://www.instagram.com/reel/xyz/")).toBe("instagram");
    expect(detectPlatform("https://fb.watch/abc/")).toBe("facebook");
    expect(detectPlatform("https://www.dailymotion.com/video/x1")).toBe("other");
  });

  it("recognises video URLs with or without a scheme", () => {
    expect(isVideoUrl("www.tiktok.com/@chef/video/1")).toBe(true);
    expect(isVideoUrl("https://example.com/recipe")).toBe(false);
  });
});

describe("selectBestThumbnail", () => {
  it("prefers an end-of-video frame over resolution", () => {
    expect(
      selectBestThumbnail([
        { url: "https://img.example.com/big.jpg", width: 1920, height: 1080 },
        { url: "https://img.example.com/final-frame.jpg", width: 320, height: 180 },
      ])
    ).toBe("https://img.example.com/final-frame.jpg");
  });

  it("then prefers resolution, then the later id", () => {
    expect(
      selectBestThumbnail([
        { url: "https://img.example.com/a.jpg", width: 640, height: 360 },
        { url: "https://img.example.com/b.jpg", width: 1280, height: 720 },
      ])
    ).toBe("https://img.example.com/b.jpg");
    expect(
      selectBestThumbnail([
        { url: "https://img.example.com/1.jpg", id: "1" },
        { url: "https://img.example.com/7.jpg", id: "7" },
      ])
    ).toBe("https://img.example.com/7.jpg");
  });

  it("keeps list order on ties and falls back when empty", () => {
    expect(
      selectBestThumbnail([{ url: "https://img.example.com/x.jpg" }, { url: "https://img.example.com/y.jpg" }])
    ).toBe("https://img.example.com/x.jpg");
    expect(selectBestThumbnail([], "https://img.example.com/default.jpg")).toBe(
      "https://img.example.com/default.jpg"
    );
  });
});

describe("metadataFromHtml", () => {
  it("reads og tags, duration and the player description", () => {
    const html = `<html><head>
      <meta property="og:title" content="Easy Dal">
      <meta property="og:image" content="https://img.example.com/dal.jpg">
      <meta property="og:image:width" content="1280">
      <meta property="og:image:height" content="720">
      <meta property="og:description" content="Short teaser">
      <meta itemprop="duration" content="PT4M13S">
    </head><body><script>var data = {"shortDescription":"Line one\\nLine two"};</script></body></html>`;

    expect(metadataFromHtml(html)).toEqual({
      title: "Easy Dal",
      uploader: undefined,
      thumbnail: "https://img.example.com/dal.jpg",
      thumbnails: [{ url: "https://img.example.com/dal.jpg", width: 1280, height: 720 }],
      duration: 253,
      description: "Line one\nLine two",
    });
  });
});

describe("VideoExtractor", () => {
  it("builds YouTube text from description and transcript", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const extractor = new VideoExtractor({
      metadata: metadataSource({
        title: "Chana Masala",
        uploader: "Test Kitchen",
        description: "2 cups chickpeas",
        thumbnail: "https://img.example.com/chana.jpg",
        duration: 300,
      }),
      transcripts: transcriptSource("Add the chickpeas and simmer."),
    });

    const video = await extractor.extract("https://www.youtube.com/watch?v=abc123");

    expect(video.fullText).toBe(
      "# Chana Masala\n\n" +
        "## Description:\n2 cups chickpeas\n\n" +
        "## Video Transcript:\nAdd the chickpeas and simmer.\n\n"
    );
    expect(video.recipeText).toBe(video.fullText);
    expect(video.author).toBe("Test Kitchen");
    expect(video.thumbnail).toBe("https://img.example.com/chana.jpg");
    expect(video.duration).toBe(300);
  });

  it("rejects a YouTube URL without an id", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const extractor = new VideoExtractor({ metadata: metadataSource({}), transcripts: transcriptSource(null) });
    await expect(extractor.extract("https://www.youtube.com/feed/trending")).rejects.toMatchObject({
      code: "VALIDATION_ERROR",
      safeMessage: "Could not extract YouTube video ID from URL: https://www.youtube.com/feed/trending",
    });
  });

  it("reports walled Instagram posts as a policy error", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const extractor = new VideoExtractor({
      metadata: metadataSource({ description: "Log in to see this post" }),
      transcripts: transcriptSource(null),
    });

    await expect(extractor.extract("https://www.instagram.com/reel/xyz/")).rejects.toMatchObject({
      code: "PLATFORM_POLICY",
      safeMessage: INSTAGRAM_AUTH_MESSAGE,
    });
  });

  it("uses a public Instagram caption", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const caption = "Ingredients: 2 eggs, 1 cup spinach. Whisk the eggs, wilt the spinach and fold together.";
    const extractor = new VideoExtractor({
      metadata: metadataSource({ description: caption, uploader: "chef" }),
      transcripts: transcriptSource(null),
    });

    const video = await extractor.extract("https://www.instagram.com/p/abc/");
    expect(video.fullText).toBe(
      "# Instagram Recipe\n\n" +
        "By: chef\n\n" +
        "Source: Instagram (https://www.instagram.com/p/abc/)\n\n" +
        `## Content:\n${caption}\n\n`
    );
  });

  it("wraps unexpected failures", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    const extractor = new VideoExtractor({
      metadata: { extract: vi.fn(async () => Promise.reject(new Error("boom"))) },
      transcripts: transcriptSource(null),
    });
    await expect(extractor.extract("https://vimeo.com/1")).rejects.toMatchObject({
      code: "UPSTREAM_ERROR",
      safeMessage: "Failed to extract video content: boom",
    });
  });
});

describe("SerpApiTranscriptSource", () => {
  it("skips the lookup without a key", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);

    expect(await new SerpApiTranscriptSource(null).fetchTranscript("abc")).toBeNull();
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("joins transcript snippets", async () => {
    vi.stubGlobal(
      "fetch",
      vi.fn(async () =>
        Response.json({ transcript: [{ snippet: "Chop  the onion." }, { snippet: "Fry it." }] })
      )
    );
    expect(await new SerpApiTranscriptSource("test-key").fetchTranscript("abc")).toBe("Chop the onion. Fry it.");
  });
});
