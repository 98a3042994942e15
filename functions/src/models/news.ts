export interface NewsDraft {
  title: string;
  summary: string | null;
  url: string;
  imageUrl: string | null;
  source: string;
  topic: string;
  publishedAt: Date;
}

export interface NewsRecord extends NewsDraft {
  id: string;
}
