export { default as PatternMatcher, describePattern, isSuppressed, type PatternMatch } from './PatternMatcher';
