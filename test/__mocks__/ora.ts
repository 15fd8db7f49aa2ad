import { jest } from '@jest/globals';

export const spinner = {
  text: '',
  start: jest.fn().mockReturnThis(),
  stop: jest.fn().mockReturnThis(),
  fail: jest.fn().mockReturnThis(),
  succeed: jest.fn().mockReturnThis(),
};

const mockOra = jest.fn(() => spinner);

export default mockOra;
