export interface User {
  id: number;
  username: string;
  role: string;
  created_at: string;
}

export interface Post {
  id: number;
  title: string;
  body: string;
  user_id: number;
  created_at: string;
}

export interface PostWithAuthor extends Post {
  username: string;
}

export interface Follow {
  following_user_id: number;
  followed_user_id: number;
  created_at: string;
}

export interface FollowWithUsernames extends Follow {
  follower_username: string;
  followed_username: string;
}

export interface HealthResponse {
  message: string;
  status: "ok";
}

export interface ApiError {
  error: string;
  issues?: Array<{ path: string; message: string }>;
}
