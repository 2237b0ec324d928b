import type { BookRecord } from '../types/index.js';

export const FICTIONAL_BOOKS: readonly BookRecord[] = [
  {
    title: '量子コンピュータで料理する方法',
    author: 'Dr. スーパーサイエンティスト',
    year: 2157,
    description: '量子コンピュータを使用して、分子レベルで料理を再構築する革新的な方法を解説',
    isbn: '978-0-123456-47-11',
  },
  {
    title: 'タイムトラベルと税金対策',
    author: '未来の会計士',
    year: 3000,
    description: 'タイムトラベルを活用した効率的な税金対策を解説',
    isbn: '978-0-123456-47-12',
  },
  {
    title: '火星での園芸入門',
    author: '火星の園芸家',
    year: 2250,
    description: '火星の特殊な環境で植物を育てる方法を解説。',
    isbn: '978-0-123456-47-13',
  },
  {
    title: 'AIと恋愛の心理学',
    author: 'ロボット心理学者',
    year: 2200,
    description: 'AIとの恋愛関係における心理学的な考察と実践的なアドバイス。',
    isbn: '978-0-123456-47-14',
  },
  {
    title: 'テレパシーでプログラミング',
    author: 'サイキックエンジニア',
    year: 2300,
    description: 'テレパシー能力を使用してコードを書く方法を解説。',
    isbn: '978-0-123456-47-15',
  },
];
