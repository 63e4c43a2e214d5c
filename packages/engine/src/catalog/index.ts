export { CourseCatalog } from "./catalog";
