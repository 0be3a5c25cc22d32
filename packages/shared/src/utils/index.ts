export * from "./shortcode.js";
export * from "./url.js";
