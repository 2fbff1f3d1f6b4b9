export * from './types';
export * from './value';
export * from './graph';
export * from './context';
export * from './scheduler';
export * from './bind';

// Animation drivers (springs, tweens) + codecs
export * from './anim/spec';
export * from './anim/adapter';
export * from './anim/codec';
export * from './anim/easing';
export * from './anim/springCoefficients';
export * from './anim/spring';
export * from './anim/tween';

// Frame source driving graph.tick()
export * from './anim/playback';
