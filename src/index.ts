/**
 * BirdDog HR Client - Main Entry Point
 */

export * from './integrations/birddog/index.js';
