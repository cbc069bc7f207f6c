import fs from 'fs';
import os from 'os';
import path from 'path';

import Absences from '../absences';
import { PersistenceReadError } from '../../errors';
import { AbsenceRecord } from '../../types';

const UUID = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/;

describe('storage/absences', () => {
    let dir: string;
    let file: string;

    beforeEach(() => {
        dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ausencias-storage-'));
        file = path.join(dir, 'atestados.csv');
    });

    afterEach(() => {
        fs.rmSync(dir, { recursive: true, force: true });
    });

    it('deve começar vazio quando o arquivo não existe', () => {
        expect(new Absences(file).read().records).toEqual([]);
    });

    it('deve criar a pasta do arquivo no init', async () => {
        const nested = path.join(dir, 'dados', 'atestados.csv');
        await new Absences(nested).init();

        expect(fs.existsSync(path.join(dir, 'dados'))).toBe(true);
    });

    it('deve gravar o cabeçalho e as colunas na ordem fixa', () => {
        const record: AbsenceRecord = {
            id: 'id-1',
            employee_name: 'Ana',
            start_date: '2024-01-30',
            day_count: 3,
            end_date: '2024-02-01',
            medical_code: 'M54',
            category: 'Atestado',
            reason: 'M54 - Dor lombar, leve',
        };

        const storage = new Absences(file);
        storage.write([record]);

        expect(fs.readFileSync(file, 'utf8')).toBe(
            'Nome_do_Colaborador,Data_de_Inicio,Dias,Data_Final,CID,Tipo,Motivo,Id\n' +
            'Ana,2024-01-30,3,2024-02-01,M54,Atestado,"M54 - Dor lombar, leve",id-1\n',
        );
        expect(storage.read().records).toEqual([record]);
    });

    it('deve renomear colunas antigas e assumir Atestado quando falta o Tipo', () => {
        fs.writeFileSync(file, [
            'Nome do Colaborador,Data de Início,Dias,Data Final,CID,Descricao_do_CID',
            'Ana,2024-01-30,3,2024-02-01,m54,Dor lombar',
        ].join('\n'));

        const [record] = new Absences(file).read().records;

        expect(record).toEqual({
            id: expect.stringMatching(UUID),
            employee_name: 'Ana',
            start_date: '2024-01-30',
            day_count: 3,
            end_date: '2024-02-01',
            medical_code: 'M54',
            category: 'Atestado',
            reason: 'Dor lombar',
        });
    });

    it('deve descartar linhas sem nome do colaborador', () => {
        fs.writeFileSync(file, [
            'Nome_do_Colaborador,Data_de_Inicio,Dias,Data_Final,CID,Tipo,Motivo',
            ',2024-01-30,1,2024-01-30,,Falta,Falta',
            'Bruno,2024-01-30,1,2024-01-30,,Falta,Falta',
        ].join('\n'));

        const records = new Absences(file).read().records;

        expect(records.map(r => r.employee_name)).toEqual(['Bruno']);
    });

    it('deve limpar o CID de tipos que não são Atestado', () => {
        fs.writeFileSync(file, [
            'Nome_do_Colaborador,Data_de_Inicio,Dias,Data_Final,CID,Tipo,Motivo',
            'Carla,2024-02-05,2,2024-02-06,Z00,Folga,Abono de feriado',
        ].join('\n'));

        const [record] = new Absences(file).read().records;

        expect(record.category).toBe('Folga');
        expect(record.medical_code).toBe('');
        expect(record.reason).toBe('Abono de feriado');
    });

    it('deve calcular os dias pelas datas quando a coluna Dias não existe', () => {
        fs.writeFileSync(file, [
            'Nome_do_Colaborador,Data_de_Inicio,Data_Final,CID,Tipo,Motivo',
            'Bia,2024-03-01 00:00:00,2024-03-05,,Falta,Falta',
        ].join('\n'));

        const [record] = new Absences(file).read().records;

        expect(record.start_date).toBe('2024-03-01');
        expect(record.day_count).toBe(5);
        expect(record.end_date).toBe('2024-03-05');
    });

    it('deve manter registros com data de início ilegível', () => {
        fs.writeFileSync(file, [
            'Nome_do_Colaborador,Data_de_Inicio,Dias,Data_Final,CID,Tipo,Motivo,Id',
            'Caio,ontem,2,,,Falta,Falta,id-9',
        ].join('\n'));

        expect(new Absences(file).read().records).toEqual([{
            id: 'id-9',
            employee_name: 'Caio',
            start_date: null,
            day_count: 2,
            end_date: null,
            medical_code: '',
            category: 'Falta',
            reason: 'Falta',
        }]);
    });

    it('deve manter o término gravado quando a quantidade de dias sai do calendário', () => {
        fs.writeFileSync(file, [
            'Nome_do_Colaborador,Data_de_Inicio,Dias,Data_Final,CID,Tipo,Motivo,Id',
            'Davi,2024-01-01,1000000000,2024-01-05,,Falta,Falta,id-7',
        ].join('\n'));

        const [record] = new Absences(file).read().records;

        expect(record.day_count).toBe(1000000000);
        expect(record.end_date).toBe('2024-01-05');
    });

    it('deve marcar como migrado o arquivo sem Id e não o arquivo atual', () => {
        fs.writeFileSync(file, [
            'Nome_do_Colaborador,Data_de_Inicio,Dias,Data_Final,CID,Tipo,Motivo',
            'Bruno,2024-01-30,1,2024-01-30,,Falta,Falta',
        ].join('\n'));

        const legacy = new Absences(file).read();

        expect(legacy.migrated).toBe(true);

        new Absences(file).write(legacy.records);

        expect(new Absences(file).read()).toEqual({ records: legacy.records, migrated: false });
    });

    it('deve falhar com PersistenceReadError quando o caminho não é um arquivo legível', () => {
        expect(() => new Absences(dir).read().records).toThrow(PersistenceReadError);
    });

    it('deve falhar com PersistenceReadError sem a coluna de nome', () => {
        fs.writeFileSync(file, 'foo,bar\n1,2\n');

        expect(() => new Absences(file).read().records).toThrow('coluna Nome_do_Colaborador ausente');
    });
});
