export { db } from "./data/db";
export { ProfileNotFoundError, profileRepo } from "./data/repositories/profileRepo";
