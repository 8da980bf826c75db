export const WARM_UP = [
  '___ ___ _19',
  '__9 32_ 5__',
  '57_ __9 2_6',
  '_27 ___ ___',
  '64_ 28_ __1',
  '__1 _63 __7',
  '7_2 8_5 __4',
  '1__ ___ 7_2',
  '_9_ _72 ___'
].join('\n');

export const WARM_UP_SOLUTION = [
  '236 758 419',
  '419 326 578',
  '578 149 236',
  '827 591 643',
  '643 287 951',
  '951 463 827',
  '762 815 394',
  '185 934 762',
  '394 672 185'
].join('\n');

export const LOCKED_CANDIDATES_PUZZLE = [
  '___ 2__ 74_',
  '45_ 6__ _9_',
  '_1_ ___ ___',
  '39_ __5 __7',
  '1_5 3__ ___',
  '___ __4 ___',
  '___ 47_ 5_6',
  '__7 593 ___',
  '___ ___ ___'
].join('\n');

export const LOCKED_CANDIDATES_SOLUTION = [
  '639 251 748',
  '458 637 192',
  '712 948 365',
  '394 825 617',
  '175 369 824',
  '826 714 953',
  '981 472 536',
  '267 593 481',
  '543 186 279'
].join('\n');

export const SKYSCRAPER_PUZZLE = [
  '___ 92_ ___',
  '2__ ___ 9_4',
  '_8_ ___ __2',
  '87_ ___ _9_',
  '__9 8_6 ___',
  '__5 __1 ___',
  '_54 1_7 3__',
  '___ __4 7__',
  '_3_ ___ _8_'
].join('\n');

export const SKYSCRAPER_SOLUTION = [
  '546 923 817',
  '213 678 954',
  '987 415 632',
  '871 342 596',
  '429 856 173',
  '365 791 248',
  '654 187 329',
  '198 234 765',
  '732 569 481'
].join('\n');

export const Y_WING_PUZZLE = [
  '___ _13 ___',
  '1_9 ___ __4',
  '_48 25_ _3_',
  '__3 ___ 4__',
  '_9_ ___ __5',
  '654 ___ ___',
  '___ __1 _9_',
  '92_ _8_ 1__',
  '___ 7__ _8_'
].join('\n');

export const Y_WING_SOLUTION = [
  '562 413 978',
  '139 678 254',
  '748 259 631',
  '873 165 429',
  '291 847 365',
  '654 932 817',
  '485 321 796',
  '927 586 143',
  '316 794 582'
].join('\n');
