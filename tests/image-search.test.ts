import { afterEach, describe, expect, it, vi } from "vitest";
import { FoodImageSearch, ImageCache, isImageUrl } from "../src/lib/image-search";

function respond(routes: Record<string, () => Response>) {
  return vi.fn(async (input: string | URL | Request) => {
    const url = String(input);
    const match = Object.keys(routes).find((prefix) => url.startsWith(prefix));
    return match ? routes[match]() : new Response("not found", { status: 404 });
  });
}

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

describe("ImageCache", () => {
  it("keeps the last write for a key", () => {
    const cache = new ImageCache();
    cache.set("Dal", "https://img.example.com/one.jpg");
    cache.set("Dal", "https://img.example.com/two.jpg");

    expect(cache.get("Dal")).toBe("https://img.example.com/two.jpg");
    expect(cache.size).toBe(1);
    cache.clear();
    expect(cache.has("Dal")).toBe(false);
  });
});

describe("isImageUrl", () => {
  it("accepts http URLs that look like images", () => {
    expect(isImageUrl("https://cdn.example.com/a.webp")).toBe(true);
    expect(isImageUrl("https://cdn.example.com/photo/123")).toBe(true);
    expect(isImageUrl("https://cdn.example.com/page")).toBe(false);
    expect(isImageUrl("/relative/a.jpg")).toBe(false);
  });
});

describe("FoodImageSearch", () => {
  it("answers from its cache without searching", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const fetchMock = vi.fn();
    vi.stubGlobal("fetch", fetchMock);
    const cache = new ImageCache();
    cache.set("Dal", "https://img.example.com/dal.jpg");

    const search = new FoodImageSearch({ cache, pexelsApiKey: null });

    expect(await search.search("Dal")).toBe("https://img.example.com/dal.jpg");
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("takes the first image from a recipe site search page", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.stubGlobal(
      "fetch",
      respond({
        "https://www.allrecipes.com/search": () =>
          new Response('<html><body><img class="card__img" data-src="/thumbs/dal.jpg"></body></html>'),
      })
    );
    const search = new FoodImageSearch({ pexelsApiKey: null });

    expect(await search.search("Dal Tadka")).toBe("https://www.allrecipes.com/thumbs/dal.jpg");
    expect(search.cache.get("Dal Tadka")).toBe("https://www.allrecipes.com/thumbs/dal.jpg");
  });

  it("falls back to Pexels when a key is set", async () => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    const fetchMock = respond({
      "https://api.pexels.com/": () =>
        Response.json({ photos: [{ src: { large2x: "https://images.pexels.com/photos/1/pexels-photo-1.jpeg?w=1260" } }] }),
    });
    vi.stubGlobal("fetch", fetchMock);
    const search = new FoodImageSearch({ pexelsApiKey: "test-key" });

    expect(await search.search("Dal")).toBe("https://images.pexels.com/photos/1/pexels-photo-1.jpeg?w=1260");
    const pexelsCall = fetchMock.mock.calls.find(([url]) => String(url).startsWith("https://api.pexels.com/"));
    expect(pexelsCall?.[0]).toBe("https://api.pexels.com/v1/search?query=Dal%20food&per_page=5");
  });

  it("returns null and caches nothing when every strategy misses", async () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.stubGlobal("fetch", respond({}));
    const search = new FoodImageSearch({ pexelsApiKey: null });

    expect(await search.search("Mystery Stew")).toBeNull();
    expect(search.cache.size).toBe(0);
  });
});
