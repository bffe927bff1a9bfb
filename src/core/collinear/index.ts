export { detectCollinearity, type CollinearityOptions } from "./detect.js";
export { isCollinear, toCollinearityPoints } from "./isCollinear.js";
