import type { WindowDescriptor } from "../types/windowFollow.js"

export type PatternRule = {
  matches(text: string): boolean
}

export type Matcher = {
  matches(window: WindowDescriptor): boolean
}

export type MatchRules = {
  title: PatternRule
  appId: PatternRule
}

export function regexRule(source: string): PatternRule {
  const re = new RegExp(source)
  return { matches: (text) => re.test(text) }
}

/**
 * A window without a title never matches. A window without an app id is
 * judged on its title alone.
 */
export function createMatcher(rules: MatchRules): Matcher {
  return {
    matches(window) {
      if (window.title == null) return false
      const appIdMatches = window.appId == null ? true : rules.appId.matches(window.appId)
      return rules.title.matches(window.title) && appIdMatches
    }
  }
}
