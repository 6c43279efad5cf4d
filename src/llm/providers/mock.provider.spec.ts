import { MockProvider } from './mock.provider.js';

describe('MockProvider', () => {
  const provider = new MockProvider();

  it('행동 목록의 첫 항목을 답한다', async () => {
    const response = await provider.complete({
      conversation: [
        { role: 'system', content: 'system' },
        {
          role: 'user',
          content:
            'Your ONLY available actions are: flamethrower (Expected Damage: 90.0, STAB), switch-pikachu',
        },
      ],
      maxTokens: 16,
      temperature: 0,
    });
    expect(response.text).toBe('flamethrower');
    expect(response.model).toBe('mock-v1');
  });

  it('교체 목록도 인식', async () => {
    const response = await provider.complete({
      conversation: [
        { role: 'user', content: 'Your ONLY available team members are: switch-mr-mime, switch-onix' },
      ],
      maxTokens: 16,
      temperature: 0,
    });
    expect(response.text).toBe('switch-mr-mime');
  });

  it('목록이 없으면 빈 응답', async () => {
    const response = await provider.complete({
      conversation: [{ role: 'user', content: 'hello' }],
      maxTokens: 16,
      temperature: 0,
    });
    expect(response.text).toBe('');
  });
});
