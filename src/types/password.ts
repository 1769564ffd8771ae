export interface PasswordConfig {
  length: number;
  useLowercase: boolean;
  useUppercase: boolean;
  useNumbers: boolean;
  useSpecial: boolean;
}

export type CharacterClassOption = Exclude<keyof PasswordConfig, 'length'>;

export interface CharacterClass {
  name: 'lowercase' | 'uppercase' | 'numbers' | 'special';
  option: CharacterClassOption;
  chars: string;
}
