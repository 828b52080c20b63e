/**
 * Admission Control - Redis Lua Scripts
 * Each check is one script, so it executes as a single indivisible step on
 * the server.
 */

// =============================================================================
// Fixed Window Lua Script
// =============================================================================

/**
 * Fixed Window Counter
 *
 * Increments unconditionally; the TTL is set only when the key is created,
 * so later increments never push the expiry forward.
 *
 * KEYS[1] - Counter key for the current window index
 * ARGV[1] - Max requests allowed
 * ARGV[2] - Window size (milliseconds)
 *
 * Returns: [allowed (0/1), count_after_increment]
 */
export const FIXED_WINDOW_SCRIPT = `
local counter_key = KEYS[1]
local max_requests = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])

local count = redis.call('INCR', counter_key)
if count == 1 then
  redis.call('PEXPIRE', counter_key, window_ms)
end

local allowed = 0
if count <= max_requests then
  allowed = 1
end

return {allowed, count}
`;

// =============================================================================
// Moving Window Lua Script
// =============================================================================

/**
 * Moving Window Counter
 *
 * Two subwindow counters with linear weighting of the previous one.
 * A denied request is not counted.
 *
 * KEYS[1] - Previous subwindow key
 * KEYS[2] - Current subwindow key
 * ARGV[1] - Max requests allowed
 * ARGV[2] - Subwindow size (milliseconds)
 * ARGV[3] - Elapsed time in the current subwindow (milliseconds)
 *
 * Returns: [allowed (0/1), current_count, previous_count]
 */
export const MOVING_WINDOW_SCRIPT = `
local prev_key = KEYS[1]
local curr_key = KEYS[2]
local max_requests = tonumber(ARGV[1])
local window_ms = tonumber(ARGV[2])
local elapsed_ms = tonumber(ARGV[3])

local prev_count = tonumber(redis.call('GET', prev_key)) or 0
local curr_count = tonumber(redis.call('GET', curr_key)) or 0

local weight = 1 - (elapsed_ms / window_ms)
local approx = curr_count + (prev_count * weight)

local allowed = 0
if approx + 1 <= max_requests then
  curr_count = redis.call('INCR', curr_key)
  if curr_count == 1 then
    -- keep it around long enough to serve as the previous subwindow
    redis.call('PEXPIRE', curr_key, window_ms * 2)
  end
  allowed = 1
end

return {allowed, curr_count, prev_count}
`;

// =============================================================================
// Offense Lua Script
// =============================================================================

/**
 * Record Offense
 *
 * Offense and ban counts share one hash and one TTL; any write refreshes
 * it. Reaching the threshold applies a ban, escalates its length and starts
 * a new offense cycle.
 *
 * KEYS[1] - Offense meta hash
 * KEYS[2] - Ban key
 * ARGV[1] - Offenses that trigger a ban
 * ARGV[2] - First ban length (seconds)
 * ARGV[3] - Max ban length (seconds)
 * ARGV[4] - Offense meta TTL (seconds)
 *
 * Returns: [offenses, ban_count, ban_seconds]
 */
export const RECORD_OFFENSE_SCRIPT = `
local meta_key = KEYS[1]
local ban_key = KEYS[2]
local ban_offenses = tonumber(ARGV[1])
local ban_length = tonumber(ARGV[2])
local ban_max_length = tonumber(ARGV[3])
local counter_ttl = tonumber(ARGV[4])

local offenses = redis.call('HINCRBY', meta_key, 'offenses', 1)
local bans = tonumber(redis.call('HGET', meta_key, 'bans')) or 0
local duration = 0

if offenses >= ban_offenses then
  bans = redis.call('HINCRBY', meta_key, 'bans', 1)
  redis.call('HSET', meta_key, 'offenses', 0)
  offenses = 0
  duration = math.floor(math.min(ban_length * (2 ^ (bans - 1)), ban_max_length))
  redis.call('SET', ban_key, '1', 'EX', duration)
end

redis.call('EXPIRE', meta_key, counter_ttl)

return {offenses, bans, duration}
`;

// =============================================================================
// Ban Scripts
// =============================================================================

/**
 * Ban Status
 * Read-only; remaining lifetime of the ban key.
 *
 * KEYS[1] - Ban key
 *
 * Returns: remaining milliseconds, or a negative number when absent
 */
export const BAN_STATUS_SCRIPT = `
return redis.call('PTTL', KEYS[1])
`;

/**
 * Clear Ban
 * Removes a ban together with its offense history.
 *
 * KEYS[1] - Offense meta hash
 * KEYS[2] - Ban key
 *
 * Returns: number of keys removed
 */
export const CLEAR_BAN_SCRIPT = `
return redis.call('DEL', KEYS[1], KEYS[2])
`;
