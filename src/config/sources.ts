// Accounts scanned on every run, in order
export const SOURCES = [
  // General anime news
  '@Anime',
  '@AniNewsAndFacts',
  '@animecornernews',
  '@AniTrendz',
  '@myanimelist',

  // Japanese outlets
  '@comic_natalie',
  '@animetv_jp',
  '@ItsAnimeJP',

  // Manga industry
  '@MangaMoguraRE',
  '@WSJ_manga',

  // Aggregators
  '@animety_off',
  '@AIR_News01',
] as const

// Substrings that mark an <img> as post media rather than an avatar or emoji
export const MEDIA_HOST_MARKERS = ['media', 'twimg'] as const
