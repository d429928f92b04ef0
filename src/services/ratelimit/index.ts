export { RateLimitService, type RateLimitCheck, type RateLimitOutcome } from './ratelimit.service';
