import { describe, expect, it } from 'vitest';
import { routeMessage } from './router.js';

describe('routeMessage', () => {
  describe('prefix markers', () => {
    it.each([
      ['пост: зимние ароматы', 'post', 'зимние ароматы'],
      ['  Пост:  зимние ароматы  ', 'post', 'зимние ароматы'],
      ['Напиши пост про осень', 'post', 'Напиши пост про осень'],
      ['создай пост о воске', 'post', 'создай пост о воске'],
      ['идеи: весна', 'ideas', 'весна'],
      ['Предложи идеи на тему зимы', 'ideas', 'на тему зимы'],
      ['идеи для постов', 'ideas', ''],
      ['Исследование: история воска', 'research', 'история воска'],
      ['Расскажи о сандале', 'research', 'Расскажи о сандале'],
      ['Что такое соевый воск?', 'research', 'Что такое соевый воск?'],
      ['правка: покороче', 'refinement', 'покороче'],
    ])('routes %j to %s', (message, taskKind, request) => {
      expect(routeMessage(message)).toEqual({ taskKind, request });
    });
  });

  describe('keywords', () => {
    it.each([
      ['Хочу новые темы', 'ideas'],
      ['Почему свечи коптят?', 'research'],
      ['Можно ли написать что-то новое? напиши', 'post'],
      ['Привет!', 'conversation'],
    ])('routes %j to %s', (message, taskKind) => {
      expect(routeMessage(message)).toEqual({ taskKind, request: message });
    });

    it('detects edits only when the chat has history', () => {
      expect(routeMessage('Сделай короче, пожалуйста').taskKind).toBe('conversation');
      expect(routeMessage('Сделай короче, пожалуйста', { hasHistory: true })).toEqual({
        taskKind: 'refinement',
        request: 'Сделай короче, пожалуйста',
      });
    });

    it('prefers edits over other keywords in a chat with history', () => {
      expect(routeMessage('Перепиши пост', { hasHistory: true }).taskKind).toBe('refinement');
    });
  });

  describe('explicit type', () => {
    it('wins over markers and keywords', () => {
      expect(routeMessage('пост: зима', { explicitType: 'research' })).toEqual({
        taskKind: 'research',
        request: 'пост: зима',
      });
      expect(routeMessage('Привет', { explicitType: 'ideas' })).toEqual({ taskKind: 'ideas', request: 'Привет' });
    });

    it('still strips a marker of the same kind', () => {
      expect(routeMessage('пост: зима', { explicitType: 'post' })).toEqual({ taskKind: 'post', request: 'зима' });
    });

    it('falls back to detection for general or unknown types', () => {
      expect(routeMessage('пост: зима', { explicitType: 'general' }).taskKind).toBe('post');
      expect(routeMessage('пост: зима', { explicitType: 'blog' }).taskKind).toBe('post');
      expect(routeMessage('пост: зима', { explicitType: null }).taskKind).toBe('post');
    });
  });
});
