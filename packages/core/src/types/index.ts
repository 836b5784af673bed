export type { Container, LogOptions, Pod, PodSet, StreamSummary, StreamTask } from './pod.js';
