import type { Post } from "./repository";

export const SAMPLE_POSTS: readonly Post[] = [
  {
    id: 1,
    title: "title of post 1",
    content: "content of post 1",
    published: false,
    rating: null
  },
  {
    id: 2,
    title: "title of post 2",
    content: "content of post 2",
    published: false,
    rating: null
  }
];
