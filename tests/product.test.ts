import { describe, expect, it } from "vitest";
import { extractProduct, hasUsableData } from "../src/core/extraction/product";

const BASE = "https://store.example.com";
const URL_ = "https://store.example.com/products/classic-tee";

const PAGE = `<html><head>
<title>Classic Tee | Example Store</title>
<meta property="og:title" content="Classic Tee">
</head><body>
<nav><a href="/collections/all">All</a></nav>
<span class="price">$19.99</span>
<img srcset="//store.example.com/cdn/shop/products/tee.jpg?v=1&width=400 400w, //store.example.com/cdn/shop/products/tee.jpg?v=1&width=800 800w">
</body></html>`;

describe("extractProduct", () => {
  it("builds a candidate from a product page", () => {
    expect(extractProduct(PAGE, URL_, BASE)).toEqual({
      id: "classic-tee",
      name: "Classic Tee",
      url: URL_,
      price: "$19.99",
      category: null,
      imageUrls: ["https://store.example.com/cdn/shop/products/tee.jpg"],
    });
  });

  it("is stable across repeated runs", () => {
    expect(extractProduct(PAGE, URL_, BASE)).toEqual(extractProduct(PAGE, URL_, BASE));
  });

  it("never throws on malformed markup", () => {
    const candidate = extractProduct("<<<div <span class=", URL_, BASE);
    expect(candidate.name).toBe("Unknown Product");
    expect(candidate.price).toBeNull();
    expect(candidate.imageUrls).toEqual([]);
  });
});

describe("hasUsableData", () => {
  it("rejects a page with neither name nor images", () => {
    expect(hasUsableData(extractProduct("<html></html>", URL_, BASE))).toBe(false);
  });

  it("accepts a named page without images", () => {
    expect(hasUsableData(extractProduct("<h1>Tee</h1>", URL_, BASE))).toBe(true);
  });
});
